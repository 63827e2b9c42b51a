import { describeSort } from "../descriptor";
import { isGreater } from "../instrumented";
import { SortingAlgorithm, type ISortRun } from "./sorting-algorithm";

const SHELL_SORT = describeSort({
    key: "shell-sort",
    name: "Shell Sort",
    timeComplexity: "O(n log² n)",
    spaceComplexity: "O(1)",
    stable: false,
    comparisonBased: true,
    domains: ["ordinal"],
});

//
// Gapped insertion sort with Shell's original gaps n/2, n/4, ..., 1.
//
export class ShellSort extends SortingAlgorithm {
    readonly descriptor = SHELL_SORT;

    protected sortElements<T>(elements: T[], { ordering, metrics, recorder }: ISortRun<T>): void {
        const n = elements.length;

        for (let gap = Math.floor(n / 2); gap > 0; gap = Math.floor(gap / 2)) {
            for (let i = gap; i < n; i++) {
                const value = elements[i];
                metrics.recordAccess();

                let j = i;
                while (j >= gap) {
                    recorder?.recordCompare(elements, j - gap, j, `Gap ${gap}: compare ${elements[j - gap]} with ${value}`);
                    metrics.recordAccess();

                    if (!isGreater(ordering, metrics, elements[j - gap], value)) {
                        break;
                    }

                    elements[j] = elements[j - gap];
                    metrics.recordMove();
                    metrics.recordAccess(2);
                    recorder?.recordSet(elements, j, `Gap ${gap}: shift ${elements[j]} to index ${j}`);
                    j -= gap;
                }

                if (j !== i) {
                    elements[j] = value;
                    metrics.recordMove();
                    metrics.recordAccess();
                    recorder?.recordSet(elements, j, `Gap ${gap}: insert ${value} at index ${j}`);
                }
            }
        }
    }
}
