/**
 * @file Token Helpers
 *
 * @module command
 */

const FULL_INTEGER: RegExp = /^[+-]?\d+$/;

/**
 * Parse a token that is entirely a decimal integer.
 *
 * `"3"`, `"-1"` and `"+7"` parse; `"3x"`, `"1.5"`, `" 3"` and `""` do not.
 * Magnitudes beyond the safe range still parse, to a value no index range
 * contains, so a long run of digits is read as an index rather than a name.
 *
 * @returns The integer, or null when the token is not a full integer.
 */
export function integer_tryParse(token: string | undefined): number | null {
    if (token === undefined || !FULL_INTEGER.test(token)) return null;
    return Number(token);
}

/**
 * Parse a full-integer token that is passed on as a value (dpi, report rate,
 * target button), where an imprecise number must not reach the device.
 *
 * @returns The integer, or null when the token is not a full, safe integer.
 */
export function safeInteger_tryParse(token: string | undefined): number | null {
    const value: number | null = integer_tryParse(token);
    return value !== null && Number.isSafeInteger(value) ? value : null;
}
