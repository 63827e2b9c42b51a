import { describeSearch } from "../descriptor";
import { PreconditionError } from "../errors";
import { compareCounted } from "../instrumented";
import { isOrdered, type IOrdering } from "../ordering";
import { SearchingAlgorithm, type ISearchRun } from "./searching-algorithm";

const BINARY_SEARCH = describeSearch({
    key: "binary-search",
    name: "Binary Search",
    timeComplexity: "O(log n)",
    spaceComplexity: "O(1)",
    requiresOrderedInput: true,
    graphBased: false,
    domains: ["ordinal", "lexical"],
});

//
// Halves the window [lo, hi] around its midpoint until the target is hit or the window is empty.
// One three-way comparison per halving.
//
export class BinarySearch extends SearchingAlgorithm {
    readonly descriptor = BINARY_SEARCH;

    protected checkPreconditions<T>(elements: readonly T[], target: T, ordering: IOrdering<T>): void {
        if (!isOrdered(elements, ordering)) {
            throw new PreconditionError(this.descriptor.name, "requires the input in ascending order");
        }
    }

    protected searchElements<T>(elements: readonly T[], { target, ordering, metrics, recorder }: ISearchRun<T>): number | undefined {
        let lo = 0;
        let hi = elements.length - 1;

        while (lo <= hi) {
            const mid = lo + Math.floor((hi - lo) / 2);
            metrics.recordAccess();
            recorder?.recordRange(elements, lo, hi, mid, `Probe ${elements[mid]} at index ${mid} in [${lo}..${hi}]`);

            const comparison = compareCounted(ordering, metrics, elements[mid], target);
            if (comparison === 0) {
                return mid;
            }
            if (comparison < 0) {
                lo = mid + 1;
            }
            else {
                hi = mid - 1;
            }
        }

        return undefined;
    }
}
