/**
 * Minimal ANSI styling for the terminal UI
 */

const CODES = {
    bold: [1, 22],
    dim: [2, 22],
    red: [31, 39],
    green: [32, 39],
    yellow: [33, 39],
    magenta: [35, 39],
    cyan: [36, 39],
} as const;

export type Style = keyof typeof CODES;

export type Theme = Record<Style, (text: string) => string>;

export function createTheme(enabled: boolean): Theme {
    const paint = (style: Style) => (text: string): string => {
        const [open, close] = CODES[style];
        return enabled ? `\u001b[${open}m${text}\u001b[${close}m` : text;
    };
    return {
        bold: paint('bold'),
        dim: paint('dim'),
        red: paint('red'),
        green: paint('green'),
        yellow: paint('yellow'),
        magenta: paint('magenta'),
        cyan: paint('cyan'),
    };
}

export const plainTheme: Theme = createTheme(false);

export function terminalTheme(stream: NodeJS.WriteStream = process.stdout): Theme {
    const enabled = stream.isTTY === true && !('NO_COLOR' in process.env);
    return createTheme(enabled);
}
