import type { IActiveRange, IHighlight, IStep, StepOperation, Trace } from "./step";

//
// Append-only log of steps for one instrumented run.
//
// Every method copies the array it is given, so a step never aliases the live working array.
// recordSwap and recordSet must be called after the mutation they describe - the recorder
// can't check that, the snapshot simply shows whatever the array holds at the call.
//
export class TraceRecorder<T> {
    private readonly recorded: IStep<T>[] = [];

    recordInitial(array: readonly T[], note: string): void {
        this.record("INIT", array, [], note);
    }

    recordCompare(array: readonly T[], i: number, j: number, note: string): void {
        this.record("COMPARE", array, [{ index: i, role: "compared" }, { index: j, role: "compared" }], note);
    }

    recordSwap(array: readonly T[], i: number, j: number, note: string): void {
        this.record("SWAP", array, [{ index: i, role: "swapped" }, { index: j, role: "swapped" }], note);
    }

    recordSet(array: readonly T[], index: number, note: string): void {
        this.record("SET", array, [{ index, role: "written" }], note);
    }

    recordCheck(array: readonly T[], index: number, note: string): void {
        this.record("CHECK", array, [{ index, role: "checked" }], note);
    }

    recordFound(array: readonly T[], index: number, note: string): void {
        this.record("FOUND", array, [{ index, role: "found" }], note);
    }

    recordNotFound(array: readonly T[], note: string): void {
        this.record("NOT_FOUND", array, [], note);
    }

    //
    // Binary-search window [lo, hi] with the midpoint at mid.
    //
    recordRange(array: readonly T[], lo: number, hi: number, mid: number, note: string): void {
        const highlights: IHighlight[] = [
            { index: lo, role: "boundary" },
            { index: hi, role: "boundary" },
            { index: mid, role: "mid" },
        ];
        this.record("RANGE", array, highlights, note, { lo, hi });
    }

    //
    // Frames a divide-and-conquer sub-problem. Indices outside [activeLo, activeHi]
    // are dimmed, the highlighted ones are marked as the focus.
    //
    recordRegion(array: readonly T[], activeLo: number, activeHi: number, highlighted: readonly number[], note: string): void {
        const highlights: IHighlight[] = [];
        for (let index = 0; index < array.length; index++) {
            if (index < activeLo || index > activeHi) {
                highlights.push({ index, role: "inactive" });
            }
        }
        for (const index of highlighted) {
            highlights.push({ index, role: "focus" });
        }
        this.record("REGION", array, highlights, note, { lo: activeLo, hi: activeHi });
    }

    recordComplete(array: readonly T[], note: string): void {
        const highlights = array.map((_, index): IHighlight => ({ index, role: "final" }));
        this.record("COMPLETE", array, highlights, note);
    }

    get length(): number {
        return this.recorded.length;
    }

    //
    // The steps recorded so far.
    //
    get steps(): Trace<T> {
        return this.recorded;
    }

    //
    // Detached copy of the trace, safe to hand to callers.
    //
    toTrace(): Trace<T> {
        return Object.freeze(this.recorded.slice());
    }

    //
    // Stores a finished step. Subclasses can observe steps as they are appended.
    //
    protected append(step: IStep<T>): void {
        this.recorded.push(step);
    }

    private record(operation: StepOperation, array: readonly T[], highlights: IHighlight[], note: string, activeRange?: IActiveRange): void {
        const step: IStep<T> = {
            sequence: this.recorded.length,
            snapshot: Object.freeze(array.slice()),
            operation,
            highlights: Object.freeze(highlights.map(highlight => Object.freeze(highlight))),
            note,
        };
        this.append(Object.freeze(activeRange ? { ...step, activeRange: Object.freeze(activeRange) } : step));
    }
}
