import { describeSort } from "../descriptor";
import { isGreater } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const INSERTION_SORT = describeSort({
    key: "insertion-sort",
    name: "Insertion Sort",
    timeComplexity: "O(n²)",
    spaceComplexity: "O(1)",
    stable: true,
    comparisonBased: true,
    domains: ["ordinal", "lexical"],
});

//
// Shift-and-insert. Shifting stops at the first element that is not strictly greater
// than the key, so equal elements are never reordered.
//
export class InsertionSort extends SortingAlgorithm {
    readonly descriptor = INSERTION_SORT;

    protected sortElements<T>(elements: T[], { ordering, metrics, recorder }: ISortRun<T>): void {
        for (let i = 1; i < elements.length; i++) {
            const key = elements[i];
            metrics.recordAccess();

            let j = i - 1;
            while (j >= 0) {
                recorder?.recordCompare(elements, j, j + 1, `Compare ${elements[j]} with ${key}`);
                metrics.recordAccess();

                if (!isGreater(ordering, metrics, elements[j], key)) {
                    break;
                }

                elements[j + 1] = elements[j];
                metrics.recordMove();
                metrics.recordAccess(2);
                recorder?.recordSet(elements, j + 1, `Shift ${elements[j]} right to index ${j + 1}`);
                j--;
            }

            if (j + 1 !== i) {
                elements[j + 1] = key;
                metrics.recordMove();
                metrics.recordAccess();
                recorder?.recordSet(elements, j + 1, `Insert ${key} at index ${j + 1}`);
            }
        }
    }
}
