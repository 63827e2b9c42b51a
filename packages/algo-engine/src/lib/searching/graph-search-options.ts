import type { GraphShape } from "../graph/graph-view";

export interface IGraphSearchOptions {
    //
    // The view of the array to traverse. Each search has its own default.
    //
    readonly shape?: GraphShape;
}
