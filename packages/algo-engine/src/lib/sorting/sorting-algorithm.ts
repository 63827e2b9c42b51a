import { assertDomainSupported, type ISortDescriptor } from "../descriptor";
import type { MetricsCounter } from "../metrics";
import type { IOrdering } from "../ordering";
import type { TraceRecorder } from "../trace/trace-recorder";

//
// Sorts elements ascending, in place, comparing only through the ordering.
//
export interface ISortingAlgorithm {
    readonly descriptor: ISortDescriptor;

    //
    // Returns the same array it was given, now sorted.
    // Throws UnsupportedDomainError or PreconditionError before touching the array.
    //
    sort<T>(elements: T[], ordering: IOrdering<T>, metrics: MetricsCounter, recorder?: TraceRecorder<T>): T[];
}

//
// Collaborators for one sorting run.
//
export interface ISortRun<T> {
    readonly ordering: IOrdering<T>;
    readonly metrics: MetricsCounter;
    readonly recorder: TraceRecorder<T> | undefined;
}

//
// Checks the capability and preconditions, frames the run with INIT and COMPLETE steps
// and leaves the algorithm body to subclasses.
//
export abstract class SortingAlgorithm implements ISortingAlgorithm {
    abstract readonly descriptor: ISortDescriptor;

    sort<T>(elements: T[], ordering: IOrdering<T>, metrics: MetricsCounter, recorder?: TraceRecorder<T>): T[] {
        assertDomainSupported(this.descriptor, ordering.domain);
        this.checkPreconditions(elements, ordering);

        recorder?.recordInitial(elements, `Initial array for ${this.descriptor.name}`);
        this.sortElements(elements, { ordering, metrics, recorder });
        recorder?.recordComplete(elements, `${this.descriptor.name} complete`);

        return elements;
    }

    //
    // Throws PreconditionError when the input can't be sorted by this algorithm.
    //
    protected checkPreconditions<T>(elements: readonly T[], ordering: IOrdering<T>): void {
        // Comparison sorts accept any input of a supported domain.
    }

    protected abstract sortElements<T>(elements: T[], run: ISortRun<T>): void;
}
