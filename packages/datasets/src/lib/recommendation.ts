import { UnknownAlgorithmError, countingSortKeyProblem, findSearchDescriptor, findSortDescriptor, supportsDomain, type AlgorithmDescriptor, type Domain, type ISearchDescriptor } from "algo-engine";
import type { IDatasetCharacteristics } from "./analyzer";

export type Confidence = "high" | "medium" | "low";

export interface IAlternative {
    readonly algorithm: string;
    readonly note: string;
}

export interface IRecommendation {
    readonly algorithm: string;
    readonly reason: string;
    readonly complexity: string;
    readonly confidence: Confidence;
    readonly alternatives: readonly IAlternative[];
    readonly warnings: readonly string[];
}

//
// Above this sortedness a dataset counts as already sorted.
//
const SORTED_THRESHOLD = 95;

//
// From this sortedness up to SORTED_THRESHOLD a dataset counts as nearly sorted.
//
const NEARLY_SORTED_THRESHOLD = 70;

const SMALL_DATASET_SIZE = 100;
const LIMITED_RANGE_FACTOR = 10;
const MANY_DUPLICATES_PERCENTAGE = 30;
const QUADRATIC_WARNING_SIZE = 1000;

function percent(value: number): string {
    return `${value.toFixed(1)}%`;
}

//
// Counting Sort's own refusal for this dataset, or undefined when it would run.
//
function countingSortProblem({ size, range }: IDatasetCharacteristics): string | undefined {
    if (range === undefined) {
        return undefined;
    }
    return countingSortKeyProblem(size, range.min, range.max, range.integers);
}

//
// Drops alternatives the dataset's domain rules out.
//
function alternatives(domain: Domain, find: (name: string) => AlgorithmDescriptor, candidates: IAlternative[]): IAlternative[] {
    return candidates.filter(candidate => supportsDomain(find(candidate.algorithm), domain));
}

function sortAlternatives(domain: Domain, candidates: IAlternative[]): IAlternative[] {
    return alternatives(domain, findSortDescriptor, candidates);
}

function searchAlternatives(domain: Domain, candidates: IAlternative[]): IAlternative[] {
    return alternatives(domain, findSearchDescriptor, candidates);
}

//
// Picks a sorting algorithm from the dataset's sortedness, size, range and duplicates.
// The first rule that matches wins.
//
export function recommendSortingAlgorithm(characteristics: IDatasetCharacteristics): IRecommendation {
    const { domain, size, sortedness, range } = characteristics;

    if (sortedness > SORTED_THRESHOLD) {
        return {
            algorithm: "Insertion Sort",
            reason: `Your dataset is ${percent(sortedness)} sorted. Insertion Sort runs in linear time on sorted or nearly sorted data.`,
            complexity: "O(n)",
            confidence: "high",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Bubble Sort", note: "stops after the first pass without a swap" },
            ]),
            warnings: ["Avoid: Quick Sort with a fixed pivot degrades to O(n²) on sorted data."],
        };
    }

    if (characteristics.reverseSorted) {
        return {
            algorithm: "Merge Sort",
            reason: "Your dataset is reverse sorted. Merge Sort takes O(n log n) whatever the input order.",
            complexity: "O(n log n)",
            confidence: "high",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Heap Sort", note: "also O(n log n) in every case" },
            ]),
            warnings: ["Avoid: Quick Sort with a fixed pivot degrades to O(n²) on reverse sorted data."],
        };
    }

    if (sortedness >= NEARLY_SORTED_THRESHOLD) {
        return {
            algorithm: "Insertion Sort",
            reason: `Your dataset is ${percent(sortedness)} sorted (nearly sorted). Insertion Sort does little work when few elements are out of place.`,
            complexity: "O(n) to O(n²)",
            confidence: "high",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Shell Sort", note: "better for larger nearly sorted datasets" },
                { algorithm: "Bubble Sort", note: "with its early exit" },
            ]),
            warnings: [],
        };
    }

    if (size < SMALL_DATASET_SIZE) {
        return {
            algorithm: "Insertion Sort",
            reason: `Your dataset is small (${size} elements). Insertion Sort has the lowest overhead on small inputs.`,
            complexity: "O(n²)",
            confidence: "high",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Selection Sort", note: "fewest moves, slightly slower" },
            ]),
            warnings: ["Note: on small datasets the choice of algorithm makes little difference."],
        };
    }

    if (range !== undefined && range.size < size * LIMITED_RANGE_FACTOR && countingSortProblem(characteristics) === undefined) {
        return {
            algorithm: "Counting Sort",
            reason: `Your dataset has a limited range (${range.size} values over ${size} elements). Counting Sort runs in O(n + k) without comparing elements.`,
            complexity: "O(n + k)",
            confidence: "high",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Quick Sort", note: "if the range grows" },
            ]),
            warnings: ["Note: Counting Sort only takes non-negative integers."],
        };
    }

    if (characteristics.duplicatePercentage > MANY_DUPLICATES_PERCENTAGE) {
        return {
            algorithm: "Quick Sort",
            reason: `Your dataset has ${percent(characteristics.duplicatePercentage)} duplicate values. Quick Sort stays O(n log n) on average with a random pivot.`,
            complexity: "O(n log n)",
            confidence: "medium",
            alternatives: sortAlternatives(domain, [
                { algorithm: "Merge Sort", note: "stable with consistent performance" },
            ]),
            warnings: ["Note: a two-way partition does extra work on runs of equal values."],
        };
    }

    return {
        algorithm: "Quick Sort",
        reason: `Your dataset is large (${size} elements) and unordered. Quick Sort has the best average O(n log n) performance.`,
        complexity: "O(n log n)",
        confidence: "high",
        alternatives: sortAlternatives(domain, [
            { algorithm: "Merge Sort", note: "guaranteed O(n log n), uses more memory" },
            { algorithm: "Heap Sort", note: "in place with guaranteed O(n log n)" },
        ]),
        warnings: ["Note: keep the pivot random to avoid the worst case."],
    };
}

//
// Binary Search for sorted data, Linear Search otherwise.
//
export function recommendSearchingAlgorithm(characteristics: IDatasetCharacteristics): IRecommendation {
    const { domain, size } = characteristics;

    if (characteristics.sorted || characteristics.sortedness > SORTED_THRESHOLD) {
        return {
            algorithm: "Binary Search",
            reason: "Your dataset is sorted. Binary Search takes O(log n) comparisons.",
            complexity: "O(log n)",
            confidence: "high",
            alternatives: searchAlternatives(domain, [
                { algorithm: "Linear Search", note: "if only one search is needed" },
            ]),
            warnings: characteristics.sorted ? [] : ["Sort the dataset first: Binary Search rejects unsorted input."],
        };
    }

    return {
        algorithm: "Linear Search",
        reason: "Your dataset is unsorted. Linear Search is the only method that needs no ordering.",
        complexity: "O(n)",
        confidence: "high",
        alternatives: searchAlternatives(domain, [
            { algorithm: "Depth-First Search", note: "explores a tree view of the data" },
            { algorithm: "Breadth-First Search", note: "explores a tree view of the data" },
            { algorithm: "Trie Search", note: "exact matches over text" },
        ]),
        warnings: size > SMALL_DATASET_SIZE
            ? ["Note: for repeated searches, sort once in O(n log n) and use Binary Search."]
            : [],
    };
}

function findSearch(algorithmName: string): ISearchDescriptor | undefined {
    try {
        return findSearchDescriptor(algorithmName);
    }
    catch (error) {
        if (error instanceof UnknownAlgorithmError) {
            return undefined;
        }
        throw error;
    }
}

//
// A warning about running the algorithm on this dataset, if there is one.
// Throws UnknownAlgorithmError when the name is neither a sort nor a search.
//
export function algorithmWarning(algorithmName: string, characteristics: IDatasetCharacteristics): string | undefined {
    const { size, range } = characteristics;

    const search = findSearch(algorithmName);
    if (search !== undefined) {
        if (!supportsDomain(search, characteristics.domain)) {
            return `${search.name} does not support ${characteristics.domain} data.`;
        }
        if (search.requiresOrderedInput && !characteristics.sorted) {
            return `${search.name} requires sorted data. Current sortedness: ${percent(characteristics.sortedness)}.`;
        }
        return undefined;
    }

    const sort = findSortDescriptor(algorithmName);
    if (!supportsDomain(sort, characteristics.domain)) {
        return `${sort.name} does not support ${characteristics.domain} data.`;
    }

    switch (sort.key) {
        case "counting-sort": {
            if (range !== undefined && (!range.integers || range.min < 0)) {
                return "Counting Sort requires non-negative integers.";
            }
            const problem = countingSortProblem(characteristics);
            if (problem !== undefined) {
                return `Counting Sort cannot sort this dataset: ${problem}.`;
            }
            if (range !== undefined && range.size > size * LIMITED_RANGE_FACTOR) {
                return `Counting Sort may use excessive memory. Range size: ${range.size}.`;
            }
            return undefined;
        }

        case "bubble-sort":
        case "selection-sort":
            if (size > QUADRATIC_WARNING_SIZE) {
                return `${sort.name} is O(n²) and may be slow on ${size} elements.`;
            }
            return undefined;

        default:
            return undefined;
    }
}
