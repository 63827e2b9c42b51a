import { InvalidInputError, isOrdered, lexicalOrdering, ordinalOrdering } from "algo-engine";
import { SeededRandomGenerator } from "utils";
import { DATASET_PATTERNS, DatasetGenerator, isDatasetPattern } from "../../lib/generator";

describe("dataset generator", () => {

    test("generates the requested number of values within the range", () => {
        const generator = new DatasetGenerator(new SeededRandomGenerator(1));

        for (const pattern of DATASET_PATTERNS) {
            const values = generator.numbers(pattern, { size: 50, min: 10, max: 20 });
            expect(values.length).toBe(50);
            for (const value of values) {
                expect(Number.isInteger(value)).toBe(true);
                expect(value).toBeGreaterThanOrEqual(10);
                expect(value).toBeLessThanOrEqual(20);
            }
        }
    });

    test("defaults to values between 1 and 10000", () => {
        const values = new DatasetGenerator(new SeededRandomGenerator(2)).numbers("random", { size: 200 });

        expect(Math.min(...values)).toBeGreaterThanOrEqual(1);
        expect(Math.max(...values)).toBeLessThanOrEqual(10000);
    });

    test("sorted and reversed datasets are ordered", () => {
        const generator = new DatasetGenerator(new SeededRandomGenerator(3));

        expect(isOrdered(generator.numbers("sorted", { size: 30 }), ordinalOrdering)).toBe(true);
        expect(isOrdered(generator.numbers("reversed", { size: 30 }).reverse(), ordinalOrdering)).toBe(true);
        expect(isOrdered(generator.words("sorted", { size: 30 }), lexicalOrdering)).toBe(true);
    });

    test("a nearly sorted dataset with no swaps is sorted", () => {
        const values = new DatasetGenerator(new SeededRandomGenerator(4)).numbers("nearly-sorted", { size: 25, swapPercentage: 0 });

        expect(isOrdered(values, ordinalOrdering)).toBe(true);
    });

    test("few-unique draws from a small pool", () => {
        const values = new DatasetGenerator(new SeededRandomGenerator(5)).numbers("few-unique", { size: 100, uniqueCount: 3 });

        expect(new Set(values).size).toBeLessThanOrEqual(3);
    });

    test("words are lowercase letters", () => {
        const words = new DatasetGenerator(new SeededRandomGenerator(6)).words("random", { size: 20 });

        expect(words.length).toBe(20);
        for (const word of words) {
            expect(word).toMatch(/^[a-z]{3,8}$/);
        }
    });

    test("the same seed gives the same dataset", () => {
        const first = new DatasetGenerator(new SeededRandomGenerator(7)).numbers("nearly-sorted", { size: 40 });
        const second = new DatasetGenerator(new SeededRandomGenerator(7)).numbers("nearly-sorted", { size: 40 });

        expect(second).toEqual(first);
    });

    test("an empty dataset is allowed", () => {
        expect(new DatasetGenerator().numbers("few-unique", { size: 0 })).toEqual([]);
    });

    test("rejects bad options", () => {
        const generator = new DatasetGenerator(new SeededRandomGenerator());

        expect(() => generator.numbers("random", { size: -1 })).toThrow(InvalidInputError);
        expect(() => generator.numbers("random", { size: 2.5 })).toThrow(InvalidInputError);
        expect(() => generator.numbers("random", { size: 5, min: 10, max: 1 })).toThrow("Invalid value range [10, 1].");
        expect(() => generator.numbers("nearly-sorted", { size: 5, swapPercentage: 150 })).toThrow(InvalidInputError);
        expect(() => generator.words("few-unique", { size: 5, uniqueCount: 0 })).toThrow(InvalidInputError);
    });

    test("recognises pattern names", () => {
        expect(isDatasetPattern("nearly-sorted")).toBe(true);
        expect(isDatasetPattern("shuffled")).toBe(false);
    });
});
