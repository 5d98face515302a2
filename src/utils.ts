export type SayFn = (s: string) => void;
export type DbgFn = (s: string) => void;

let debugEnabled = false;

/**
 * Turns debug output on or off for the whole process.
 * Debug output is off until this is called with `true`.
 */
export function setDebug(enabled: boolean) {
    debugEnabled = enabled;
}

export function dbg(s: string) {
    if (debugEnabled) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

/**
 * Parses a whole line as a decimal integer.
 *
 * Accepts an optional leading sign followed by digits and nothing else, so
 * surrounding whitespace, decimals and exponents are all rejected.
 * @returns The parsed integer, or `undefined` if the line is not one.
 */
export function parseInteger(input: string): number | undefined {
    if (!/^[+-]?\d+$/.test(input)) {
        return undefined;
    }
    const value = Number(input);
    return Number.isSafeInteger(value) ? value : undefined;
}
