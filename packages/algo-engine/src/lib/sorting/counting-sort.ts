import { describeSort } from "../descriptor";
import { PreconditionError } from "../errors";
import type { IOrdering } from "../ordering";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const COUNTING_SORT = describeSort({
    key: "counting-sort",
    name: "Counting Sort",
    timeComplexity: "O(n + k)",
    spaceComplexity: "O(n + k)",
    stable: true,
    comparisonBased: false,
    domains: ["ordinal"],
});

//
// Smallest key range always allowed, whatever the input size.
//
const MIN_KEY_RANGE = 1000;

//
// Allowed key range per element of input.
//
const KEY_RANGE_PER_ELEMENT = 10;

//
// Largest key range (max key + 1) accepted for an input of the given size.
//
export function maxCountingSortRange(size: number): number {
    return Math.max(size * KEY_RANGE_PER_ELEMENT, MIN_KEY_RANGE);
}

//
// Why Counting Sort refuses keys with these bounds, or undefined when it accepts them.
// `integers` says whether every key is a whole number.
//
export function countingSortKeyProblem(size: number, minKey: number, maxKey: number, integers: boolean): string | undefined {
    if (size === 0) {
        return undefined;
    }
    if (!integers || minKey < 0) {
        return "requires non-negative integers";
    }
    const limit = maxCountingSortRange(size);
    if (maxKey + 1 > limit) {
        return `key range ${maxKey + 1} exceeds the limit of ${limit} for ${size} elements`;
    }
    return undefined;
}

//
// Distribution sort over non-negative integer keys. Makes no comparisons.
// Elements are placed back to front from the prefix sums, which keeps equal keys in input order.
//
export class CountingSort extends SortingAlgorithm {
    readonly descriptor = COUNTING_SORT;

    protected checkPreconditions<T>(elements: readonly T[], ordering: IOrdering<T>): void {
        const key = ordering.key;
        if (key === undefined) {
            throw new PreconditionError(this.descriptor.name, "the ordering provides no integer key");
        }

        let maxKey = 0;
        for (const element of elements) {
            const value = key(element);
            if (!Number.isInteger(value) || value < 0) {
                throw new PreconditionError(this.descriptor.name, `requires non-negative integers, got ${value}`);
            }
            maxKey = Math.max(maxKey, value);
        }

        const problem = countingSortKeyProblem(elements.length, 0, maxKey, true);
        if (problem !== undefined) {
            throw new PreconditionError(this.descriptor.name, problem);
        }
    }

    protected sortElements<T>(elements: T[], { ordering, metrics, recorder }: ISortRun<T>): void {
        const key = ordering.key;
        if (key === undefined || elements.length === 0) {
            return;
        }

        const keys = elements.map(element => key(element));
        metrics.recordAccess(elements.length);

        const maxKey = keys.reduce((max, value) => Math.max(max, value), 0);
        const counts = new Array<number>(maxKey + 1).fill(0);
        for (const value of keys) {
            counts[value]++;
        }

        for (let i = 1; i < counts.length; i++) {
            counts[i] += counts[i - 1];
        }

        const output = new Array<T>(elements.length);
        for (let i = elements.length - 1; i >= 0; i--) {
            counts[keys[i]]--;
            output[counts[keys[i]]] = elements[i];
            metrics.recordAccess();
        }

        for (let i = 0; i < output.length; i++) {
            elements[i] = output[i];
            metrics.recordMove();
            metrics.recordAccess();
            recorder?.recordSet(elements, i, `Write ${output[i]} to index ${i}`);
        }
    }
}
