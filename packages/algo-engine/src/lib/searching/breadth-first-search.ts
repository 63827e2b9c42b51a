import { describeSearch } from "../descriptor";
import { childrenOf, toGraphView, type GraphShape } from "../graph/graph-view";
import { isEqual } from "../instrumented";
import type { IGraphSearchOptions } from "./graph-search-options";
import { SearchingAlgorithm, type ISearchRun } from "./searching-algorithm";

const BREADTH_FIRST_SEARCH = describeSearch({
    key: "breadth-first-search",
    name: "Breadth-First Search",
    timeComplexity: "O(V + E)",
    spaceComplexity: "O(V)",
    requiresOrderedInput: false,
    graphBased: true,
    domains: ["ordinal"],
});

//
// Level-order traversal with a queue, over a complete binary tree in heap layout
// unless another shape is requested.
//
export class BreadthFirstSearch extends SearchingAlgorithm {
    readonly descriptor = BREADTH_FIRST_SEARCH;

    readonly shape: GraphShape;

    constructor(options?: IGraphSearchOptions) {
        super();
        this.shape = options?.shape ?? "complete-binary-tree";
    }

    protected searchElements<T>(elements: readonly T[], { target, ordering, metrics, recorder }: ISearchRun<T>): number | undefined {
        const view = toGraphView(elements, this.shape, ordering);
        if (view.root === undefined) {
            return undefined;
        }

        const visited = new Set<number>([view.root]);
        const queue: number[] = [view.root];
        let head = 0;

        while (head < queue.length) {
            const id = queue[head++];
            const node = view.nodes[id];
            metrics.recordAccess();
            recorder?.recordCheck(elements, id, `Visit node ${node.value} (index ${id})`);
            if (isEqual(ordering, metrics, node.value, target)) {
                return id;
            }

            for (const child of childrenOf(node)) {
                if (!visited.has(child)) {
                    visited.add(child);
                    queue.push(child);
                }
            }
        }

        return undefined;
    }
}
