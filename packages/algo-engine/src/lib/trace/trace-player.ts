import { InvalidInputError } from "../errors";
import type { IStep, Trace } from "./step";

//
// Cursor for stepping backwards and forwards through a recorded trace.
// Steps are immutable, so moving the cursor never changes what a step shows.
//
export class TracePlayer<T> {
    private index = 0;

    constructor(private readonly trace: Trace<T>) {
        if (trace.length === 0) {
            throw new InvalidInputError("Cannot replay an empty trace.");
        }
    }

    get current(): IStep<T> {
        return this.trace[this.index];
    }

    get position(): number {
        return this.index;
    }

    get length(): number {
        return this.trace.length;
    }

    get isAtStart(): boolean {
        return this.index === 0;
    }

    get isAtEnd(): boolean {
        return this.index === this.trace.length - 1;
    }

    //
    // Moves one step forward. Returns false when already at the last step.
    //
    stepForward(): boolean {
        if (this.isAtEnd) {
            return false;
        }
        this.index++;
        return true;
    }

    //
    // Moves one step back. Returns false when already at the first step.
    //
    stepBackward(): boolean {
        if (this.isAtStart) {
            return false;
        }
        this.index--;
        return true;
    }

    //
    // Jumps to a step, clamped to the trace.
    //
    seek(position: number): IStep<T> {
        this.index = Math.min(Math.max(Math.trunc(position), 0), this.trace.length - 1);
        return this.current;
    }

    reset(): void {
        this.index = 0;
    }
}
