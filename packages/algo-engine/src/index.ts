export * from "./lib/ordering";
export * from "./lib/errors";
export * from "./lib/metrics";
export * from "./lib/instrumented";
export * from "./lib/descriptor";
export * from "./lib/trace/step";
export * from "./lib/trace/trace-recorder";
export * from "./lib/trace/trace-player";
export * from "./lib/graph/graph-view";
export * from "./lib/sorting/sorting-algorithm";
export * from "./lib/sorting/bubble-sort";
export * from "./lib/sorting/selection-sort";
export * from "./lib/sorting/insertion-sort";
export * from "./lib/sorting/quick-sort";
export * from "./lib/sorting/merge-sort";
export * from "./lib/sorting/heap-sort";
export * from "./lib/sorting/shell-sort";
export * from "./lib/sorting/counting-sort";
export * from "./lib/searching/searching-algorithm";
export * from "./lib/searching/graph-search-options";
export * from "./lib/searching/linear-search";
export * from "./lib/searching/binary-search";
export * from "./lib/searching/depth-first-search";
export * from "./lib/searching/breadth-first-search";
export * from "./lib/searching/trie-search";
export * from "./lib/catalog";
export * from "./lib/engine";
export * from "./lib/comparison";
