import type { IRandomGenerator } from "utils";
import type { AlgorithmKind, ISearchDescriptor, ISortDescriptor } from "./descriptor";
import { UnknownAlgorithmError } from "./errors";
import type { GraphShape } from "./graph/graph-view";
import { BreadthFirstSearch } from "./searching/breadth-first-search";
import { BinarySearch } from "./searching/binary-search";
import { DepthFirstSearch } from "./searching/depth-first-search";
import { LinearSearch } from "./searching/linear-search";
import type { ISearchingAlgorithm } from "./searching/searching-algorithm";
import { TrieSearch } from "./searching/trie-search";
import { BubbleSort } from "./sorting/bubble-sort";
import { CountingSort } from "./sorting/counting-sort";
import { HeapSort } from "./sorting/heap-sort";
import { InsertionSort } from "./sorting/insertion-sort";
import { MergeSort } from "./sorting/merge-sort";
import { QuickSort } from "./sorting/quick-sort";
import { SelectionSort } from "./sorting/selection-sort";
import { ShellSort } from "./sorting/shell-sort";
import type { ISortingAlgorithm } from "./sorting/sorting-algorithm";

//
// Dependencies handed to an algorithm when it is created.
//
export interface IAlgorithmOptions {
    //
    // Random source for Quick Sort's pivot choice.
    //
    readonly random?: IRandomGenerator;

    //
    // Graph view for Depth-First and Breadth-First Search.
    //
    readonly graphShape?: GraphShape;
}

type SortFactory = (options: IAlgorithmOptions) => ISortingAlgorithm;
type SearchFactory = (options: IAlgorithmOptions) => ISearchingAlgorithm;

const SORT_FACTORIES: readonly SortFactory[] = [
    () => new BubbleSort(),
    () => new SelectionSort(),
    () => new InsertionSort(),
    options => new QuickSort(options.random),
    () => new MergeSort(),
    () => new HeapSort(),
    () => new ShellSort(),
    () => new CountingSort(),
];

const SEARCH_FACTORIES: readonly SearchFactory[] = [
    () => new LinearSearch(),
    () => new BinarySearch(),
    options => new DepthFirstSearch({ shape: options.graphShape }),
    options => new BreadthFirstSearch({ shape: options.graphShape }),
    () => new TrieSearch(),
];

const SORT_DESCRIPTORS: readonly ISortDescriptor[] = Object.freeze(SORT_FACTORIES.map(create => create({}).descriptor));
const SEARCH_DESCRIPTORS: readonly ISearchDescriptor[] = Object.freeze(SEARCH_FACTORIES.map(create => create({}).descriptor));

//
// Extra names, normalized, for algorithms better known by an abbreviation.
//
const ALIASES: ReadonlyMap<string, string> = new Map([
    ["dfs", "depthfirstsearch"],
    ["bfs", "breadthfirstsearch"],
    ["trie", "triesearch"],
    ["prefixtree", "triesearch"],
    ["prefixtreesearch", "triesearch"],
]);

//
// Lower case without spaces, dashes or underscores: "Quick Sort", "quick-sort" and "QUICK_SORT" all match.
//
export function normalizeAlgorithmName(name: string): string {
    return name.toLowerCase().replace(/[\s_-]+/g, "");
}

//
// Index of the descriptor the name refers to. The kind suffix is optional, so "quick" finds Quick Sort.
//
function resolveIndex(name: string, kind: AlgorithmKind, descriptors: readonly (ISortDescriptor | ISearchDescriptor)[]): number {
    const normalized = normalizeAlgorithmName(name);
    const candidates = [normalized, `${normalized}${kind}`, ALIASES.get(normalized)];
    const index = descriptors.findIndex(descriptor => candidates.includes(normalizeAlgorithmName(descriptor.key)));
    if (index < 0) {
        throw new UnknownAlgorithmError(name, descriptors.map(descriptor => descriptor.name));
    }
    return index;
}

//
// Static catalog query. Descriptors are frozen and listed in a fixed order.
//
export function listAlgorithms(kind: "sort"): readonly ISortDescriptor[];
export function listAlgorithms(kind: "search"): readonly ISearchDescriptor[];
export function listAlgorithms(kind: AlgorithmKind): readonly (ISortDescriptor | ISearchDescriptor)[];
export function listAlgorithms(kind: AlgorithmKind): readonly (ISortDescriptor | ISearchDescriptor)[] {
    return kind === "sort" ? SORT_DESCRIPTORS : SEARCH_DESCRIPTORS;
}

export function findSortDescriptor(name: string): ISortDescriptor {
    return SORT_DESCRIPTORS[resolveIndex(name, "sort", SORT_DESCRIPTORS)];
}

export function findSearchDescriptor(name: string): ISearchDescriptor {
    return SEARCH_DESCRIPTORS[resolveIndex(name, "search", SEARCH_DESCRIPTORS)];
}

//
// Creates a fresh sorting algorithm. Throws UnknownAlgorithmError for an unrecognised name.
//
export function createSortingAlgorithm(name: string, options: IAlgorithmOptions = {}): ISortingAlgorithm {
    return SORT_FACTORIES[resolveIndex(name, "sort", SORT_DESCRIPTORS)](options);
}

//
// Creates a fresh searching algorithm. Throws UnknownAlgorithmError for an unrecognised name.
//
export function createSearchingAlgorithm(name: string, options: IAlgorithmOptions = {}): ISearchingAlgorithm {
    return SEARCH_FACTORIES[resolveIndex(name, "search", SEARCH_DESCRIPTORS)](options);
}
