import { describeSearch } from "../descriptor";
import { isEqual } from "../instrumented";
import { SearchingAlgorithm, type ISearchRun } from "./searching-algorithm";

const LINEAR_SEARCH = describeSearch({
    key: "linear-search",
    name: "Linear Search",
    timeComplexity: "O(n)",
    spaceComplexity: "O(1)",
    requiresOrderedInput: false,
    graphBased: false,
    domains: ["ordinal", "lexical"],
});

//
// Scans left to right and stops at the first match.
//
export class LinearSearch extends SearchingAlgorithm {
    readonly descriptor = LINEAR_SEARCH;

    protected searchElements<T>(elements: readonly T[], { target, ordering, metrics, recorder }: ISearchRun<T>): number | undefined {
        for (let i = 0; i < elements.length; i++) {
            metrics.recordAccess();
            recorder?.recordCheck(elements, i, `Check ${elements[i]} at index ${i}`);
            if (isEqual(ordering, metrics, elements[i], target)) {
                return i;
            }
        }
        return undefined;
    }
}
