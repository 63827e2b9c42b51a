import { describeSearch } from "../descriptor";
import { PreconditionError } from "../errors";
import { isEqual } from "../instrumented";
import type { IOrdering } from "../ordering";
import { SearchingAlgorithm, type ISearchRun } from "./searching-algorithm";

const TRIE_SEARCH = describeSearch({
    key: "trie-search",
    name: "Trie Search",
    timeComplexity: "O(m)",
    spaceComplexity: "O(n * m)",
    requiresOrderedInput: false,
    graphBased: false,
    domains: ["lexical"],
});

interface ITrieNode {
    readonly children: Map<string, ITrieNode>;

    //
    // Index of the first element that ends at this node.
    //
    index?: number;
}

function createNode(): ITrieNode {
    return { children: new Map() };
}

//
// Builds a prefix tree over every element, then walks it one code point of the target at a time.
// A terminal node is confirmed with a single comparison through the ordering.
//
export class TrieSearch extends SearchingAlgorithm {
    readonly descriptor = TRIE_SEARCH;

    protected checkPreconditions<T>(elements: readonly T[], target: T, ordering: IOrdering<T>): void {
        for (const value of [...elements, target]) {
            this.textOf(value);
        }
    }

    protected searchElements<T>(elements: readonly T[], { target, ordering, metrics, recorder }: ISearchRun<T>): number | undefined {
        const root = createNode();

        elements.forEach((element, index) => {
            metrics.recordAccess();
            recorder?.recordCheck(elements, index, `Insert "${element}" into the trie`);
            this.insert(root, this.textOf(element), index);
        });

        let node = root;
        for (const codePoint of this.textOf(target)) {
            const child = node.children.get(codePoint);
            if (child === undefined) {
                return undefined;
            }
            node = child;
        }

        if (node.index === undefined) {
            return undefined;
        }

        metrics.recordAccess();
        return isEqual(ordering, metrics, elements[node.index], target) ? node.index : undefined;
    }

    private insert(root: ITrieNode, text: string, index: number): void {
        let node = root;
        for (const codePoint of text) {
            let child = node.children.get(codePoint);
            if (child === undefined) {
                child = createNode();
                node.children.set(codePoint, child);
            }
            node = child;
        }
        if (node.index === undefined) {
            node.index = index;
        }
    }

    private textOf(value: unknown): string {
        if (typeof value !== "string") {
            throw new PreconditionError(this.descriptor.name, `requires text elements, got ${typeof value}`);
        }
        return value;
    }
}
