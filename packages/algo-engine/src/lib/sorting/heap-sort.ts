import { describeSort } from "../descriptor";
import { isGreater, swap } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const HEAP_SORT = describeSort({
    key: "heap-sort",
    name: "Heap Sort",
    timeComplexity: "O(n log n)",
    spaceComplexity: "O(1)",
    stable: false,
    comparisonBased: true,
    domains: ["ordinal"],
});

//
// Builds a max-heap bottom-up, then repeatedly swaps the root to the end
// and restores the heap over the shrinking prefix.
//
export class HeapSort extends SortingAlgorithm {
    readonly descriptor = HEAP_SORT;

    protected sortElements<T>(elements: T[], run: ISortRun<T>): void {
        const n = elements.length;

        // Last internal node is at n / 2 - 1.
        for (let i = Math.floor(n / 2) - 1; i >= 0; i--) {
            this.siftDown(elements, n, i, run);
        }

        for (let end = n - 1; end > 0; end--) {
            swap(elements, 0, end, run.metrics);
            run.recorder?.recordSwap(elements, 0, end, `Move maximum ${elements[end]} to index ${end}`);
            run.recorder?.recordRegion(elements, 0, end - 1, [0], `Restore the heap over [0..${end - 1}]`);
            this.siftDown(elements, end, 0, run);
        }
    }

    private siftDown<T>(elements: T[], size: number, root: number, { ordering, metrics, recorder }: ISortRun<T>): void {
        let current = root;

        while (true) {
            let largest = current;
            const left = 2 * current + 1;
            const right = 2 * current + 2;

            if (left < size) {
                recorder?.recordCompare(elements, left, largest, `Compare child ${elements[left]} with ${elements[largest]}`);
                metrics.recordAccess(2);
                if (isGreater(ordering, metrics, elements[left], elements[largest])) {
                    largest = left;
                }
            }

            if (right < size) {
                recorder?.recordCompare(elements, right, largest, `Compare child ${elements[right]} with ${elements[largest]}`);
                metrics.recordAccess(2);
                if (isGreater(ordering, metrics, elements[right], elements[largest])) {
                    largest = right;
                }
            }

            if (largest === current) {
                return;
            }

            swap(elements, current, largest, metrics);
            recorder?.recordSwap(elements, current, largest, `Sift ${elements[largest]} down to index ${largest}`);
            current = largest;
        }
    }
}
