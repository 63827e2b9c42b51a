//
// What happened at a step.
//
export type StepOperation =
    | "INIT"
    | "COMPARE"
    | "SWAP"
    | "SET"
    | "CHECK"
    | "RANGE"
    | "FOUND"
    | "NOT_FOUND"
    | "COMPLETE"
    | "REGION";

//
// Why an index is highlighted in a step.
//
export type HighlightRole =
    | "compared"    // Two elements being compared.
    | "swapped"     // Two elements that were just exchanged.
    | "written"     // A slot that was just written.
    | "checked"     // A slot a search just examined.
    | "found"       // Where a search found its target.
    | "boundary"    // Edge of a search window.
    | "mid"         // Probe point of a search window.
    | "focus"       // Pivot, split point or root inside an active region.
    | "inactive"    // Outside the active region.
    | "final";      // In its final position.

export interface IHighlight {
    readonly index: number;
    readonly role: HighlightRole;
}

//
// Inclusive sub-range of the array a divide-and-conquer step works on.
//
export interface IActiveRange {
    readonly lo: number;
    readonly hi: number;
}

//
// One immutable moment in an algorithm's execution.
//
export interface IStep<T> {
    //
    // 0-based, strictly increasing within a trace.
    //
    readonly sequence: number;

    //
    // Copy of the working array at this instant. Never shared with the live array.
    //
    readonly snapshot: readonly T[];

    readonly operation: StepOperation;

    readonly highlights: readonly IHighlight[];

    readonly activeRange?: IActiveRange;

    //
    // Human-readable narration.
    //
    readonly note: string;
}

//
// The full ordered list of steps produced by one instrumented run.
//
export type Trace<T> = readonly IStep<T>[];

//
// Indices highlighted with the given role, in recording order.
//
export function indicesWithRole<T>(step: IStep<T>, role: HighlightRole): number[] {
    return step.highlights
        .filter(highlight => highlight.role === role)
        .map(highlight => highlight.index);
}
