import { PreconditionError, UnsupportedDomainError } from "../../lib/errors";
import { MetricsCounter } from "../../lib/metrics";
import { lexicalOrdering, ordinalOrdering } from "../../lib/ordering";
import { CountingSort, countingSortKeyProblem, maxCountingSortRange } from "../../lib/sorting/counting-sort";
import { TraceRecorder } from "../../lib/trace/trace-recorder";

describe("counting sort", () => {

    test("places elements from the prefix sums without comparing", () => {
        const metrics = new MetricsCounter();
        const recorder = new TraceRecorder<number>();
        const result = new CountingSort().sort([3, 1, 2, 1], ordinalOrdering, metrics, recorder);

        expect(result).toEqual([1, 1, 2, 3]);
        expect(metrics.comparisonCount).toBe(0);
        expect(metrics.moveCount).toBe(4);
        expect(recorder.steps.map(step => step.operation)).toEqual(["INIT", "SET", "SET", "SET", "SET", "COMPLETE"]);
    });

    test("rejects negative values before recording anything", () => {
        const elements = [-1, 2, 3];
        const recorder = new TraceRecorder<number>();

        expect(() => new CountingSort().sort(elements, ordinalOrdering, new MetricsCounter(), recorder))
            .toThrow(new PreconditionError("Counting Sort", "requires non-negative integers, got -1"));
        expect(recorder.length).toBe(0);
        expect(elements).toEqual([-1, 2, 3]);
    });

    test("rejects fractions", () => {
        expect(() => new CountingSort().sort([1.5, 2], ordinalOrdering, new MetricsCounter()))
            .toThrow("Counting Sort: requires non-negative integers, got 1.5");
    });

    test("rejects a range that dwarfs the element count", () => {
        expect(() => new CountingSort().sort([0, 5000], ordinalOrdering, new MetricsCounter()))
            .toThrow("Counting Sort: key range 5001 exceeds the limit of 1000 for 2 elements");
    });

    test("the allowed range grows with the input", () => {
        expect(maxCountingSortRange(0)).toBe(1000);
        expect(maxCountingSortRange(100)).toBe(1000);
        expect(maxCountingSortRange(500)).toBe(5000);
    });

    test("key bounds are judged the same way the sort judges its input", () => {
        expect(countingSortKeyProblem(200, 5000, 5199, true)).toBe("key range 5200 exceeds the limit of 2000 for 200 elements");
        expect(countingSortKeyProblem(200, 0, 1999, true)).toBeUndefined();
        expect(countingSortKeyProblem(3, 0.5, 2.5, false)).toBe("requires non-negative integers");
        expect(countingSortKeyProblem(3, -1, 2, true)).toBe("requires non-negative integers");
        expect(countingSortKeyProblem(0, 0, 0, true)).toBeUndefined();
    });

    test("rejects text", () => {
        expect(() => new CountingSort().sort(["b", "a"], lexicalOrdering, new MetricsCounter()))
            .toThrow(UnsupportedDomainError);
    });
});
