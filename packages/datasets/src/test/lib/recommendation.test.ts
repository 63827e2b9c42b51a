import { UnknownAlgorithmError, runSort } from "algo-engine";
import { analyzeNumbers, analyzeWords, type IDatasetCharacteristics } from "../../lib/analyzer";
import { algorithmWarning, recommendSearchingAlgorithm, recommendSortingAlgorithm } from "../../lib/recommendation";

function largeDataset(overrides: Partial<IDatasetCharacteristics>): IDatasetCharacteristics {
    return {
        domain: "ordinal",
        size: 200,
        sortedness: 50,
        sorted: false,
        reverseSorted: false,
        uniqueCount: 200,
        hasDuplicates: false,
        duplicatePercentage: 0,
        range: { min: 0, max: 99999, size: 100000, integers: true },
        distribution: "random",
        ...overrides,
    };
}

//
// 0..size-1 in a scrambled order (about a third of adjacent pairs ascending), shifted by offset.
//
function scrambled(size: number, offset: number): number[] {
    return Array.from({ length: size }, (_, i) => (i * 137) % size + offset);
}

function alternativeNames(characteristics: IDatasetCharacteristics, recommend = recommendSortingAlgorithm): string[] {
    return recommend(characteristics).alternatives.map(alternative => alternative.algorithm);
}

describe("sorting recommendation", () => {

    test("sorted data gets insertion sort", () => {
        const recommendation = recommendSortingAlgorithm(analyzeNumbers([1, 2, 3, 4, 5]));

        expect(recommendation.algorithm).toBe("Insertion Sort");
        expect(recommendation.reason).toBe("Your dataset is 100.0% sorted. Insertion Sort runs in linear time on sorted or nearly sorted data.");
        expect(recommendation.complexity).toBe("O(n)");
        expect(recommendation.confidence).toBe("high");
    });

    test("reverse sorted data gets merge sort", () => {
        expect(recommendSortingAlgorithm(analyzeNumbers([3, 2, 1])).algorithm).toBe("Merge Sort");
        expect(alternativeNames(analyzeNumbers([3, 2, 1]))).toEqual(["Heap Sort"]);
    });

    test("alternatives are limited to the dataset's domain", () => {
        const words = analyzeWords(["c", "b", "a"]);

        expect(recommendSortingAlgorithm(words).algorithm).toBe("Merge Sort");
        expect(alternativeNames(words)).toEqual([]);
    });

    test("nearly sorted data gets insertion sort", () => {
        const recommendation = recommendSortingAlgorithm(analyzeNumbers([1, 2, 3, 4, 5, 6, 7, 8, 10, 9]));

        expect(recommendation.algorithm).toBe("Insertion Sort");
        expect(recommendation.reason).toContain("88.9% sorted (nearly sorted)");
        expect(alternativeNames(analyzeNumbers([1, 2, 3, 4, 5, 6, 7, 8, 10, 9]))).toEqual(["Shell Sort", "Bubble Sort"]);
    });

    test("small unsorted data gets insertion sort", () => {
        const recommendation = recommendSortingAlgorithm(analyzeNumbers([5, 1, 4, 2, 3]));

        expect(recommendation.algorithm).toBe("Insertion Sort");
        expect(recommendation.reason).toContain("small (5 elements)");
    });

    test("a limited non-negative range gets counting sort", () => {
        const recommendation = recommendSortingAlgorithm(largeDataset({ range: { min: 0, max: 49, size: 50, integers: true } }));

        expect(recommendation.algorithm).toBe("Counting Sort");
        expect(recommendation.reason).toContain("(50 values over 200 elements)");
    });

    test("a narrow range of small integers gets counting sort, which then runs", () => {
        const values = scrambled(200, 0);
        const recommendation = recommendSortingAlgorithm(analyzeNumbers(values));

        expect(recommendation.algorithm).toBe("Counting Sort");
        expect(runSort(values, recommendation.algorithm, "ordinal").sortedElements).toEqual(Array.from({ length: 200 }, (_, i) => i));
    });

    test.each([
        ["far from zero", 5000],
        ["of fractions", 0.5],
    ])("a narrow range %s does not get counting sort", (_label, offset) => {
        const values = scrambled(200, offset);
        const recommendation = recommendSortingAlgorithm(analyzeNumbers(values));

        expect(recommendation.algorithm).toBe("Quick Sort");
        expect(() => runSort(values, recommendation.algorithm, "ordinal")).not.toThrow();
    });

    test("many duplicates get quick sort with medium confidence", () => {
        const recommendation = recommendSortingAlgorithm(largeDataset({
            range: { min: -5, max: 44, size: 50, integers: true },
            duplicatePercentage: 75,
        }));

        expect(recommendation.algorithm).toBe("Quick Sort");
        expect(recommendation.confidence).toBe("medium");
    });

    test("large unordered data gets quick sort", () => {
        const recommendation = recommendSortingAlgorithm(largeDataset({}));

        expect(recommendation.algorithm).toBe("Quick Sort");
        expect(recommendation.confidence).toBe("high");
        expect(alternativeNames(largeDataset({}))).toEqual(["Merge Sort", "Heap Sort"]);
    });

    test("text never gets counting sort", () => {
        const recommendation = recommendSortingAlgorithm(largeDataset({ domain: "lexical", range: undefined }));

        expect(recommendation.algorithm).toBe("Quick Sort");
    });
});

describe("searching recommendation", () => {

    test("sorted data gets binary search", () => {
        const recommendation = recommendSearchingAlgorithm(analyzeNumbers([1, 2, 3]));

        expect(recommendation.algorithm).toBe("Binary Search");
        expect(recommendation.warnings).toEqual([]);
    });

    test("unsorted numbers get linear search with graph searches as alternatives", () => {
        expect(recommendSearchingAlgorithm(analyzeNumbers([3, 1, 2])).algorithm).toBe("Linear Search");
        expect(alternativeNames(analyzeNumbers([3, 1, 2]), recommendSearchingAlgorithm))
            .toEqual(["Depth-First Search", "Breadth-First Search"]);
    });

    test("unsorted words get trie search as the alternative", () => {
        expect(alternativeNames(analyzeWords(["b", "a"]), recommendSearchingAlgorithm)).toEqual(["Trie Search"]);
    });

    test("large unsorted data suggests sorting once", () => {
        expect(recommendSearchingAlgorithm(largeDataset({})).warnings).toEqual([
            "Note: for repeated searches, sort once in O(n log n) and use Binary Search.",
        ]);
    });
});

describe("algorithm warnings", () => {

    test("binary search on unsorted data", () => {
        expect(algorithmWarning("binary", largeDataset({})))
            .toBe("Binary Search requires sorted data. Current sortedness: 50.0%.");
    });

    test("counting sort on negative values", () => {
        expect(algorithmWarning("counting sort", largeDataset({ range: { min: -1, max: 5, size: 7, integers: true } })))
            .toBe("Counting Sort requires non-negative integers.");
    });

    test("counting sort past its key limit", () => {
        expect(algorithmWarning("counting sort", largeDataset({})))
            .toBe("Counting Sort cannot sort this dataset: key range 100000 exceeds the limit of 2000 for 200 elements.");
    });

    test("counting sort over a wide range it still accepts", () => {
        expect(algorithmWarning("counting sort", largeDataset({ size: 10, range: { min: 0, max: 999, size: 1000, integers: true } })))
            .toBe("Counting Sort may use excessive memory. Range size: 1000.");
    });

    test("counting sort on fractions", () => {
        expect(algorithmWarning("counting sort", analyzeNumbers(scrambled(200, 0.5))))
            .toBe("Counting Sort requires non-negative integers.");
    });

    test("counting sort on a narrow range far from zero", () => {
        expect(algorithmWarning("counting sort", analyzeNumbers(scrambled(200, 5000))))
            .toBe("Counting Sort cannot sort this dataset: key range 5200 exceeds the limit of 2000 for 200 elements.");
    });

    test("quadratic sorts on large data", () => {
        expect(algorithmWarning("Bubble Sort", largeDataset({ size: 2000 })))
            .toBe("Bubble Sort is O(n²) and may be slow on 2000 elements.");
    });

    test("unsupported domains", () => {
        expect(algorithmWarning("trie", largeDataset({}))).toBe("Trie Search does not support ordinal data.");
    });

    test("nothing to warn about", () => {
        expect(algorithmWarning("quick", largeDataset({}))).toBeUndefined();
        expect(algorithmWarning("linear", largeDataset({}))).toBeUndefined();
    });

    test("unknown names are rejected", () => {
        expect(() => algorithmWarning("bogo", largeDataset({}))).toThrow(UnknownAlgorithmError);
    });
});
