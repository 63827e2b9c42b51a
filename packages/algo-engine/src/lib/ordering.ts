//
// Element domains an algorithm run can operate over.
//
// ordinal - finite numbers, compared numerically.
// lexical - strings, compared in UTF-16 code unit order.
//
export type Domain = "ordinal" | "lexical";

export const DOMAINS: readonly Domain[] = ["ordinal", "lexical"];

//
// Result of a three-way comparison: a before b, equal, a after b.
//
export type Comparison = -1 | 0 | 1;

//
// Answers "is a before, equal to or after b" for one element domain.
// Algorithms never compare elements with built-in operators, only through an ordering.
//
export interface IOrdering<T> {
    //
    // The domain this ordering is bound to.
    //
    readonly domain: Domain;

    //
    // Total order consistent with the domain's natural comparison.
    //
    compare(a: T, b: T): Comparison;

    //
    // Non-negative integer key used by distribution sorts.
    // Only ordinal orderings provide one.
    //
    key?(value: T): number;
}

export const ordinalOrdering: IOrdering<number> = Object.freeze({
    domain: "ordinal" as const,
    compare(a: number, b: number): Comparison {
        if (a < b) {
            return -1;
        }
        return a > b ? 1 : 0;
    },
    key(value: number): number {
        return value;
    },
});

export const lexicalOrdering: IOrdering<string> = Object.freeze({
    domain: "lexical" as const,
    compare(a: string, b: string): Comparison {
        if (a < b) {
            return -1;
        }
        return a > b ? 1 : 0;
    },
});

//
// Checks the elements are in non-decreasing order without touching any metrics.
// Used to validate preconditions before a run starts.
//
export function isOrdered<T>(elements: readonly T[], ordering: IOrdering<T>): boolean {
    for (let i = 1; i < elements.length; i++) {
        if (ordering.compare(elements[i - 1], elements[i]) > 0) {
            return false;
        }
    }
    return true;
}
