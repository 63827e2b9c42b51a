import type { Domain, DomainValues } from "algo-engine";
import { UsageError } from "./errors";

//
// Splits command line values on commas and whitespace, so "5,2,4" and "5 2 4" read the same.
//
export function splitValues(inputs: readonly string[]): string[] {
    return inputs
        .flatMap(input => input.split(/[\s,]+/))
        .filter(value => value.length > 0);
}

export function parseNumber(text: string): number {
    const value = Number(text);
    if (text.trim() === "" || !Number.isFinite(value)) {
        throw new UsageError(`"${text}" is not a number. Use --lexical to work with text.`);
    }
    return value;
}

//
// Parses the values for the domain: numbers for ordinal, the words as given for lexical.
//
export function parseValues(inputs: readonly string[], domain: Domain): DomainValues {
    const values = splitValues(inputs);
    if (domain === "ordinal") {
        return { domain, values: values.map(parseNumber) };
    }
    return { domain, values };
}

//
// Parses a whole number option such as --seed or --size.
//
export function parseInteger(text: string, option: string): number {
    const value = Number(text);
    if (!/^-?\d+$/.test(text.trim()) || !Number.isSafeInteger(value)) {
        throw new UsageError(`${option} must be a whole number, got "${text}".`);
    }
    return value;
}
