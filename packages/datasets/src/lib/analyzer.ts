import { lexicalOrdering, ordinalOrdering, toDomainValues, type Domain, type IOrdering } from "algo-engine";

//
// How numeric values spread over their range.
//
export type Distribution = "uniform" | "normal" | "skewed" | "random";

//
// Datasets smaller than this are always classed as "random".
//
const MIN_DISTRIBUTION_SIZE = 10;
const MAX_BUCKETS = 10;

export interface IValueRange {
    readonly min: number;
    readonly max: number;

    //
    // max - min + 1
    //
    readonly size: number;

    //
    // Every value is a whole number.
    //
    readonly integers: boolean;
}

export interface IDatasetCharacteristics {
    readonly domain: Domain;
    readonly size: number;

    //
    // Share of adjacent pairs already in ascending order, 0 to 100.
    //
    readonly sortedness: number;

    readonly sorted: boolean;
    readonly reverseSorted: boolean;
    readonly uniqueCount: number;
    readonly hasDuplicates: boolean;

    //
    // Elements that repeat an earlier value, as a percentage of the size.
    //
    readonly duplicatePercentage: number;

    //
    // Numbers only.
    //
    readonly range?: IValueRange;

    readonly distribution: Distribution;
}

interface ISortedness {
    readonly sortedness: number;
    readonly sorted: boolean;
    readonly reverseSorted: boolean;
}

function measureSortedness<T>(values: readonly T[], ordering: IOrdering<T>): ISortedness {
    if (values.length <= 1) {
        return { sortedness: 100, sorted: true, reverseSorted: true };
    }

    let ascending = 0;
    let descending = 0;
    for (let i = 0; i < values.length - 1; i++) {
        const comparison = ordering.compare(values[i], values[i + 1]);
        if (comparison <= 0) {
            ascending++;
        }
        if (comparison >= 0) {
            descending++;
        }
    }

    const pairs = values.length - 1;
    return {
        sortedness: ascending * 100 / pairs,
        sorted: ascending === pairs,
        reverseSorted: descending === pairs,
    };
}

function measureRange(values: readonly number[]): IValueRange | undefined {
    if (values.length === 0) {
        return undefined;
    }
    let min = values[0];
    let max = values[0];
    let integers = true;
    for (const value of values) {
        min = Math.min(min, value);
        max = Math.max(max, value);
        integers = integers && Number.isInteger(value);
    }
    return { min, max, size: max - min + 1, integers };
}

//
// Buckets the values over their range and classifies the shape of the histogram.
//
export function classifyDistribution(values: readonly number[], range: IValueRange): Distribution {
    if (values.length < MIN_DISTRIBUTION_SIZE) {
        return "random";
    }

    const bucketCount = Math.max(1, Math.min(MAX_BUCKETS, Math.floor(range.size)));
    const buckets = new Array<number>(bucketCount).fill(0);
    for (const value of values) {
        const index = Math.min(Math.floor((value - range.min) * bucketCount / range.size), bucketCount - 1);
        buckets[index]++;
    }

    const average = values.length / bucketCount;
    const variance = buckets.reduce((sum, count) => sum + (count - average) ** 2, 0) / bucketCount;

    if (variance < average * 0.5) {
        return "uniform";
    }
    if (bucketCount >= 3) {
        // Peak in the middle.
        const edgeAverage = (buckets[0] + buckets[bucketCount - 1]) / 2;
        if (buckets[Math.floor(bucketCount / 2)] > edgeAverage * 1.5) {
            return "normal";
        }

        // One half holds more than twice the other.
        const midPoint = Math.floor(bucketCount / 2);
        const left = buckets.slice(0, midPoint).reduce((sum, count) => sum + count, 0);
        const right = buckets.slice(midPoint).reduce((sum, count) => sum + count, 0);
        if (Math.max(left, right) > 2 * Math.min(left, right)) {
            return "skewed";
        }
    }
    return "random";
}

function analyzeValues<T>(domain: Domain, values: readonly T[], ordering: IOrdering<T>): Omit<IDatasetCharacteristics, "range" | "distribution"> {
    const uniqueCount = new Set(values).size;
    return {
        domain,
        size: values.length,
        ...measureSortedness(values, ordering),
        uniqueCount,
        hasDuplicates: uniqueCount < values.length,
        duplicatePercentage: values.length > 0 ? (values.length - uniqueCount) * 100 / values.length : 0,
    };
}

export function analyzeNumbers(values: readonly number[]): IDatasetCharacteristics {
    const range = measureRange(values);
    return {
        ...analyzeValues("ordinal", values, ordinalOrdering),
        range,
        distribution: range !== undefined ? classifyDistribution(values, range) : "random",
    };
}

export function analyzeWords(values: readonly string[]): IDatasetCharacteristics {
    return {
        ...analyzeValues("lexical", values, lexicalOrdering),
        distribution: "random",
    };
}

//
// Validates the values against the domain, then analyzes them.
//
export function analyzeDataset(values: readonly unknown[], domain: Domain): IDatasetCharacteristics {
    const input = toDomainValues(values, domain);
    return input.domain === "ordinal" ? analyzeNumbers(input.values) : analyzeWords(input.values);
}
