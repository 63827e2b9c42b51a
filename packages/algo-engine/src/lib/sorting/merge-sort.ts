import { describeSort } from "../descriptor";
import { isLessOrEqual } from "../instrumented";
import type { MetricsCounter } from "../metrics";
import type { TraceRecorder } from "../trace/trace-recorder";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const MERGE_SORT = describeSort({
    key: "merge-sort",
    name: "Merge Sort",
    timeComplexity: "O(n log n)",
    spaceComplexity: "O(n)",
    stable: true,
    comparisonBased: true,
    domains: ["ordinal", "lexical"],
});

//
// Top-down merge sort. Splits at the midpoint and merges through temporary buffers;
// on ties the left element is taken first.
//
export class MergeSort extends SortingAlgorithm {
    readonly descriptor = MERGE_SORT;

    protected sortElements<T>(elements: T[], run: ISortRun<T>): void {
        this.mergeSort(elements, 0, elements.length - 1, run);
    }

    private mergeSort<T>(elements: T[], lo: number, hi: number, run: ISortRun<T>): void {
        if (lo >= hi) {
            return;
        }

        const mid = lo + Math.floor((hi - lo) / 2);
        run.recorder?.recordRegion(elements, lo, hi, [mid], `Split [${lo}..${hi}] at ${mid}`);

        this.mergeSort(elements, lo, mid, run);
        this.mergeSort(elements, mid + 1, hi, run);
        this.merge(elements, lo, mid, hi, run);
    }

    private merge<T>(elements: T[], lo: number, mid: number, hi: number, { ordering, metrics, recorder }: ISortRun<T>): void {
        const left = elements.slice(lo, mid + 1);
        const right = elements.slice(mid + 1, hi + 1);
        metrics.recordAccess(left.length + right.length);

        recorder?.recordRegion(elements, lo, hi, [], `Merge [${lo}..${mid}] with [${mid + 1}..${hi}]`);

        let i = 0;
        let j = 0;
        let k = lo;

        while (i < left.length && j < right.length) {
            if (isLessOrEqual(ordering, metrics, left[i], right[j])) {
                this.place(elements, k++, left[i++], metrics, recorder);
            }
            else {
                this.place(elements, k++, right[j++], metrics, recorder);
            }
        }

        while (i < left.length) {
            this.place(elements, k++, left[i++], metrics, recorder);
        }

        while (j < right.length) {
            this.place(elements, k++, right[j++], metrics, recorder);
        }
    }

    private place<T>(elements: T[], index: number, value: T, metrics: MetricsCounter, recorder: TraceRecorder<T> | undefined): void {
        elements[index] = value;
        metrics.recordMove();
        metrics.recordAccess();
        recorder?.recordSet(elements, index, `Place ${value} at index ${index}`);
    }
}
