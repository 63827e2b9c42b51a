import { isOrdered, lexicalOrdering, ordinalOrdering } from "../../lib/ordering";

describe("ordering", () => {

    test("ordinal ordering compares numerically", () => {
        expect(ordinalOrdering.compare(1, 2)).toBe(-1);
        expect(ordinalOrdering.compare(2, 2)).toBe(0);
        expect(ordinalOrdering.compare(10, 9)).toBe(1);
        expect(ordinalOrdering.compare(-3.5, -3)).toBe(-1);
    });

    test("ordinal ordering exposes an integer key", () => {
        expect(ordinalOrdering.key?.(7)).toBe(7);
    });

    test("lexical ordering compares by code unit", () => {
        expect(lexicalOrdering.compare("apple", "banana")).toBe(-1);
        expect(lexicalOrdering.compare("pear", "pear")).toBe(0);
        expect(lexicalOrdering.compare("pears", "pear")).toBe(1);
        expect(lexicalOrdering.compare("B", "a")).toBe(-1);
    });

    test("lexical ordering has no key", () => {
        expect(lexicalOrdering.key).toBeUndefined();
    });

    test("orderings are bound to their domain", () => {
        expect(ordinalOrdering.domain).toBe("ordinal");
        expect(lexicalOrdering.domain).toBe("lexical");
    });

    test("isOrdered accepts non-decreasing input", () => {
        expect(isOrdered([], ordinalOrdering)).toBe(true);
        expect(isOrdered([1], ordinalOrdering)).toBe(true);
        expect(isOrdered([1, 2, 2, 3], ordinalOrdering)).toBe(true);
        expect(isOrdered(["a", "b", "b"], lexicalOrdering)).toBe(true);
    });

    test("isOrdered rejects a descent", () => {
        expect(isOrdered([1, 3, 2], ordinalOrdering)).toBe(false);
        expect(isOrdered(["b", "a"], lexicalOrdering)).toBe(false);
    });
});
