import { RandomGenerator, type IRandomGenerator } from "utils";
import { describeSort } from "../descriptor";
import { isLessOrEqual, swap } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const QUICK_SORT = describeSort({
    key: "quick-sort",
    name: "Quick Sort",
    timeComplexity: "O(n log n)",
    spaceComplexity: "O(log n)",
    stable: false,
    comparisonBased: true,
    domains: ["ordinal", "lexical"],
});

//
// Quick sort with a pivot drawn uniformly from the current range.
// The pivot is always swapped to the end of the range, then a Lomuto partition moves
// every element <= pivot to the left.
//
// Pass a seeded random generator to make the trace and metrics reproducible.
//
export class QuickSort extends SortingAlgorithm {
    readonly descriptor = QUICK_SORT;

    constructor(private readonly random: IRandomGenerator = new RandomGenerator()) {
        super();
    }

    protected sortElements<T>(elements: T[], run: ISortRun<T>): void {
        this.quickSort(elements, 0, elements.length - 1, run);
    }

    private quickSort<T>(elements: T[], lo: number, hi: number, run: ISortRun<T>): void {
        if (lo >= hi) {
            return;
        }

        const pivotIndex = this.partition(elements, lo, hi, run);
        this.quickSort(elements, lo, pivotIndex - 1, run);
        this.quickSort(elements, pivotIndex + 1, hi, run);
    }

    //
    // Returns the final index of the pivot.
    //
    private partition<T>(elements: T[], lo: number, hi: number, { ordering, metrics, recorder }: ISortRun<T>): number {
        const randomIndex = this.random.randomInt(lo, hi);
        swap(elements, randomIndex, hi, metrics);
        recorder?.recordSwap(elements, randomIndex, hi, `Move random pivot ${elements[hi]} to the end of [${lo}..${hi}]`);

        const pivot = elements[hi];
        metrics.recordAccess();
        recorder?.recordRegion(elements, lo, hi, [hi], `Partition [${lo}..${hi}] around pivot ${pivot}`);

        let boundary = lo - 1;
        for (let j = lo; j < hi; j++) {
            recorder?.recordCompare(elements, j, hi, `Compare ${elements[j]} with pivot ${pivot}`);
            metrics.recordAccess();

            if (isLessOrEqual(ordering, metrics, elements[j], pivot)) {
                boundary++;
                swap(elements, boundary, j, metrics);
                recorder?.recordSwap(elements, boundary, j, `Move ${elements[boundary]} left of the pivot`);
            }
        }

        swap(elements, boundary + 1, hi, metrics);
        recorder?.recordSwap(elements, boundary + 1, hi, `Place pivot ${pivot} at index ${boundary + 1}`);

        return boundary + 1;
    }
}
