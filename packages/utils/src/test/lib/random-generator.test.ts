import { RandomGenerator, SeededRandomGenerator } from "../../lib/random-generator";

describe("SeededRandomGenerator", () => {

    test("same seed produces the same sequence", () => {
        const first = new SeededRandomGenerator(42);
        const second = new SeededRandomGenerator(42);

        for (let i = 0; i < 20; i++) {
            expect(first.random()).toBe(second.random());
        }
    });

    test("different seeds diverge", () => {
        const first = new SeededRandomGenerator(1);
        const second = new SeededRandomGenerator(2);

        const a = Array.from({ length: 5 }, () => first.random());
        const b = Array.from({ length: 5 }, () => second.random());
        expect(a).not.toEqual(b);
    });

    test("random stays within [0, 1)", () => {
        const generator = new SeededRandomGenerator(7);
        for (let i = 0; i < 1000; i++) {
            const value = generator.random();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    test("randomInt is inclusive at both ends", () => {
        const generator = new SeededRandomGenerator(99);
        const seen = new Set<number>();
        for (let i = 0; i < 500; i++) {
            const value = generator.randomInt(3, 5);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(3);
            expect(value).toBeLessThanOrEqual(5);
            seen.add(value);
        }
        expect([...seen].sort()).toEqual([3, 4, 5]);
    });

    test("randomInt with equal bounds always returns the bound", () => {
        const generator = new SeededRandomGenerator();
        expect(generator.randomInt(4, 4)).toBe(4);
        expect(generator.randomInt(4, 4)).toBe(4);
    });

    test("randomString returns lowercase letters of the requested length", () => {
        const generator = new SeededRandomGenerator(5);
        const value = generator.randomString(12);
        expect(value).toHaveLength(12);
        expect(value).toMatch(/^[a-z]+$/);
    });

    test("reset rewinds the sequence", () => {
        const generator = new SeededRandomGenerator(11);
        const before = [generator.random(), generator.random()];
        generator.reset();
        expect([generator.random(), generator.random()]).toEqual(before);
    });
});

describe("RandomGenerator", () => {

    test("randomInt stays within bounds", () => {
        const generator = new RandomGenerator();
        for (let i = 0; i < 200; i++) {
            const value = generator.randomInt(-2, 2);
            expect(value).toBeGreaterThanOrEqual(-2);
            expect(value).toBeLessThanOrEqual(2);
        }
    });

    test("randomString returns lowercase letters", () => {
        expect(new RandomGenerator().randomString(6)).toMatch(/^[a-z]{6}$/);
    });
});
