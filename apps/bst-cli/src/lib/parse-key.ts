import { FatalError } from "utils";

const KEY_PATTERN = /^[+-]?\d+$/;

//
// Parses user input as a key. Returns undefined unless the input is a whole number in the safe integer range.
//
export function parseKey(input: string): number | undefined {
    const trimmed = input.trim();
    if (!KEY_PATTERN.test(trimmed)) {
        return undefined;
    }

    const key = Number(trimmed);
    if (!Number.isSafeInteger(key)) {
        return undefined;
    }

    return key;
}

//
// Validation for key prompts: returns an error message for input that isn't a key.
//
export function validateKey(input: string): string | undefined {
    if (parseKey(input) === undefined) {
        return "Please enter a whole number.";
    }
    return undefined;
}

//
// Parses a key from the command line, failing with a user-facing error.
//
export function requireKey(input: string): number {
    const key = parseKey(input);
    if (key === undefined) {
        throw new FatalError(`"${input}" is not a valid key. Keys are whole numbers.`);
    }
    return key;
}
