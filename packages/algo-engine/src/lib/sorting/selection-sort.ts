import { describeSort } from "../descriptor";
import { isLess, swap } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const SELECTION_SORT = describeSort({
    key: "selection-sort",
    name: "Selection Sort",
    timeComplexity: "O(n²)",
    spaceComplexity: "O(1)",
    stable: false,
    comparisonBased: true,
    domains: ["ordinal", "lexical"],
});

//
// Finds the minimum of the unsorted remainder and swaps it into place.
// Ties keep the first occurrence as the minimum.
//
export class SelectionSort extends SortingAlgorithm {
    readonly descriptor = SELECTION_SORT;

    protected sortElements<T>(elements: T[], { ordering, metrics, recorder }: ISortRun<T>): void {
        const n = elements.length;

        for (let i = 0; i < n - 1; i++) {
            let minIndex = i;

            for (let j = i + 1; j < n; j++) {
                recorder?.recordCompare(elements, j, minIndex, `Compare ${elements[j]} with current minimum ${elements[minIndex]}`);
                metrics.recordAccess(2);

                if (isLess(ordering, metrics, elements[j], elements[minIndex])) {
                    minIndex = j;
                }
            }

            if (minIndex !== i) {
                swap(elements, i, minIndex, metrics);
                recorder?.recordSwap(elements, i, minIndex, `Move minimum ${elements[i]} to index ${i}`);
            }
        }
    }
}
