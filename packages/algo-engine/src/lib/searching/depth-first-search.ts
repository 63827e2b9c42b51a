import { describeSearch } from "../descriptor";
import { childrenOf, toGraphView, type GraphShape } from "../graph/graph-view";
import { isEqual } from "../instrumented";
import type { IGraphSearchOptions } from "./graph-search-options";
import { SearchingAlgorithm, type ISearchRun } from "./searching-algorithm";

const DEPTH_FIRST_SEARCH = describeSearch({
    key: "depth-first-search",
    name: "Depth-First Search",
    timeComplexity: "O(V + E)",
    spaceComplexity: "O(V)",
    requiresOrderedInput: false,
    graphBased: true,
    domains: ["ordinal"],
});

//
// Pre-order traversal with an explicit stack, over a binary search tree built from the array
// unless another shape is requested. Reports the array index of the first matching node visited.
//
export class DepthFirstSearch extends SearchingAlgorithm {
    readonly descriptor = DEPTH_FIRST_SEARCH;

    readonly shape: GraphShape;

    constructor(options?: IGraphSearchOptions) {
        super();
        this.shape = options?.shape ?? "binary-search-tree";
    }

    protected searchElements<T>(elements: readonly T[], { target, ordering, metrics, recorder }: ISearchRun<T>): number | undefined {
        const view = toGraphView(elements, this.shape, ordering);
        if (view.root === undefined) {
            return undefined;
        }

        const visited = new Set<number>();
        const stack: number[] = [view.root];

        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined || visited.has(id)) {
                continue;
            }
            visited.add(id);

            const node = view.nodes[id];
            metrics.recordAccess();
            recorder?.recordCheck(elements, id, `Visit node ${node.value} (index ${id})`);
            if (isEqual(ordering, metrics, node.value, target)) {
                return id;
            }

            // Reversed so the left child is popped first.
            const children = childrenOf(node);
            for (let i = children.length - 1; i >= 0; i--) {
                if (!visited.has(children[i])) {
                    stack.push(children[i]);
                }
            }
        }

        return undefined;
    }
}
