import { z } from 'zod';

/**
 * Usernames are embedded verbatim into URL templates (paths and subdomains),
 * so only characters that survive both are accepted.
 */
export const usernameSchema = z
    .string()
    .trim()
    .transform((value) => value.replace(/^@/, ''))
    .pipe(
        z
            .string()
            .min(1, 'Username cannot be empty')
            .max(50, 'Username must be at most 50 characters')
            .regex(/^[A-Za-z0-9._-]+$/, 'Use only letters, numbers, dots, hyphens and underscores')
    );

export type UsernameValidation =
    | { ok: true; username: string }
    | { ok: false; message: string };

export function validateUsername(input: string): UsernameValidation {
    const parsed = usernameSchema.safeParse(input);
    if (!parsed.success) {
        return { ok: false, message: parsed.error.issues[0]?.message ?? 'Invalid username' };
    }
    return { ok: true, username: parsed.data };
}
