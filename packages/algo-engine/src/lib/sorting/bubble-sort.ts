import { describeSort } from "../descriptor";
import { isGreater, swap } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const BUBBLE_SORT = describeSort({
    key: "bubble-sort",
    name: "Bubble Sort",
    timeComplexity: "O(n²)",
    spaceComplexity: "O(1)",
    stable: true,
    comparisonBased: true,
    domains: ["ordinal", "lexical"],
});

//
// Repeated passes over adjacent pairs. Stops after the first pass without a swap.
//
export class BubbleSort extends SortingAlgorithm {
    readonly descriptor = BUBBLE_SORT;

    protected sortElements<T>(elements: T[], { ordering, metrics, recorder }: ISortRun<T>): void {
        const n = elements.length;

        for (let pass = 0; pass < n - 1; pass++) {
            let swapped = false;

            // The largest remaining element bubbles up to n - pass - 1.
            for (let j = 0; j < n - pass - 1; j++) {
                recorder?.recordCompare(elements, j, j + 1, `Compare ${elements[j]} and ${elements[j + 1]}`);
                metrics.recordAccess(2);

                if (isGreater(ordering, metrics, elements[j], elements[j + 1])) {
                    swap(elements, j, j + 1, metrics);
                    swapped = true;
                    recorder?.recordSwap(elements, j, j + 1, `Swap ${elements[j + 1]} and ${elements[j]}`);
                }
            }

            if (!swapped) {
                break;
            }
        }
    }
}
