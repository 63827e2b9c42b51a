import { InvalidInputError, lexicalOrdering, ordinalOrdering, type IOrdering } from "algo-engine";
import { RandomGenerator, type IRandomGenerator } from "utils";

//
// Shapes of generated datasets.
//
export type DatasetPattern = "random" | "sorted" | "reversed" | "nearly-sorted" | "few-unique";

export const DATASET_PATTERNS: readonly DatasetPattern[] = ["random", "sorted", "reversed", "nearly-sorted", "few-unique"];

export const DEFAULT_MIN_VALUE = 1;
export const DEFAULT_MAX_VALUE = 10000;
export const DEFAULT_SWAP_PERCENTAGE = 10;

const MIN_WORD_LENGTH = 3;
const MAX_WORD_LENGTH = 8;

export interface IGenerateOptions {
    //
    // Number of elements to generate.
    //
    readonly size: number;

    //
    // Inclusive value bounds for numbers. Defaults to 1 and 10000.
    //
    readonly min?: number;
    readonly max?: number;

    //
    // For "nearly-sorted": random swaps as a percentage of the size.
    //
    readonly swapPercentage?: number;

    //
    // For "few-unique": how many distinct values to draw from. Defaults to a tenth of the size.
    //
    readonly uniqueCount?: number;
}

export function isDatasetPattern(value: string): value is DatasetPattern {
    return DATASET_PATTERNS.some(pattern => pattern === value);
}

//
// Builds test datasets. All randomness comes from the injected generator, so a
// seeded generator reproduces the same datasets.
//
export class DatasetGenerator {
    constructor(private readonly random: IRandomGenerator = new RandomGenerator()) {
    }

    //
    // Integers between min and max, arranged by the pattern.
    //
    numbers(pattern: DatasetPattern, options: IGenerateOptions): number[] {
        const min = options.min ?? DEFAULT_MIN_VALUE;
        const max = options.max ?? DEFAULT_MAX_VALUE;
        if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
            throw new InvalidInputError(`Invalid value range [${min}, ${max}].`);
        }
        return this.generate(pattern, options, ordinalOrdering, () => this.random.randomInt(min, max));
    }

    //
    // Random lowercase words, arranged by the pattern.
    //
    words(pattern: DatasetPattern, options: IGenerateOptions): string[] {
        return this.generate(pattern, options, lexicalOrdering, () => this.random.randomString(this.random.randomInt(MIN_WORD_LENGTH, MAX_WORD_LENGTH)));
    }

    private generate<T>(pattern: DatasetPattern, options: IGenerateOptions, ordering: IOrdering<T>, next: () => T): T[] {
        const size = options.size;
        if (!Number.isInteger(size) || size < 0) {
            throw new InvalidInputError(`Dataset size must be a non-negative integer, got ${size}.`);
        }

        switch (pattern) {
            case "random":
                return Array.from({ length: size }, next);

            case "sorted":
                return this.sorted(size, ordering, next);

            case "reversed":
                return this.sorted(size, ordering, next).reverse();

            case "nearly-sorted": {
                const data = this.sorted(size, ordering, next);
                const swapPercentage = options.swapPercentage ?? DEFAULT_SWAP_PERCENTAGE;
                if (swapPercentage < 0 || swapPercentage > 100) {
                    throw new InvalidInputError(`Swap percentage must be between 0 and 100, got ${swapPercentage}.`);
                }
                const swapCount = Math.floor(size * swapPercentage / 100);
                for (let i = 0; i < swapCount; i++) {
                    const a = this.random.randomInt(0, size - 1);
                    const b = this.random.randomInt(0, size - 1);
                    const temp = data[a];
                    data[a] = data[b];
                    data[b] = temp;
                }
                return data;
            }

            case "few-unique": {
                const uniqueCount = options.uniqueCount ?? Math.max(1, Math.floor(size / 10));
                if (!Number.isInteger(uniqueCount) || uniqueCount < 1) {
                    throw new InvalidInputError(`Unique count must be a positive integer, got ${uniqueCount}.`);
                }
                const pool = Array.from({ length: uniqueCount }, next);
                return Array.from({ length: size }, () => pool[this.random.randomInt(0, pool.length - 1)]);
            }
        }
    }

    private sorted<T>(size: number, ordering: IOrdering<T>, next: () => T): T[] {
        return Array.from({ length: size }, next).sort((a, b) => ordering.compare(a, b));
    }
}
