/**
 * Line prompts for the interactive loop.
 * A readline interface is only open while a question is pending, so Ctrl-C
 * during a scan reaches the process SIGINT handler.
 */

import { createInterface } from 'readline';

export interface Prompter {
    /** Resolves to null when input is closed (EOF / Ctrl-D) */
    ask(question: string, defaultValue?: string): Promise<string | null>;
}

export function createPrompter(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Prompter {
    let ended = false;

    return {
        ask(question: string, defaultValue?: string): Promise<string | null> {
            if (ended) return Promise.resolve(null);
            const suffix = defaultValue !== undefined && defaultValue !== '' ? ` (${defaultValue})` : '';
            const rl = createInterface({ input, output, terminal: false });

            return new Promise<string | null>((resolve) => {
                let answered = false;
                rl.once('line', (line: string) => {
                    answered = true;
                    rl.close();
                    const value = line.trim();
                    resolve(value === '' ? defaultValue ?? '' : value);
                });
                rl.once('close', () => {
                    if (answered) return;
                    ended = true;
                    resolve(null);
                });
                output.write(`${question}${suffix}: `);
            });
        },
    };
}

/**
 * Ask until the answer is one of the choices
 */
export async function choose(prompter: Prompter, question: string, choices: readonly string[], defaultValue: string): Promise<string | null> {
    for (;;) {
        const answer = await prompter.ask(`${question} [${choices.join('/')}]`, defaultValue);
        if (answer === null) return null;
        const normalized = answer.toLowerCase();
        if (choices.includes(normalized)) return normalized;
    }
}
