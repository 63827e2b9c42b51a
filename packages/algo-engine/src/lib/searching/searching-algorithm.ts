import { assertDomainSupported, type ISearchDescriptor } from "../descriptor";
import type { MetricsCounter } from "../metrics";
import type { IOrdering } from "../ordering";
import type { TraceRecorder } from "../trace/trace-recorder";

//
// Looks for a target among elements without modifying them.
//
export interface ISearchingAlgorithm {
    readonly descriptor: ISearchDescriptor;

    //
    // The input must be ascending before calling search.
    //
    readonly requiresOrderedInput: boolean;

    //
    // Returns the index of the target in elements, or undefined when it isn't there.
    // Throws UnsupportedDomainError or PreconditionError before recording anything.
    //
    search<T>(elements: readonly T[], target: T, ordering: IOrdering<T>, metrics: MetricsCounter, recorder?: TraceRecorder<T>): number | undefined;
}

//
// Collaborators for one search.
//
export interface ISearchRun<T> {
    readonly target: T;
    readonly ordering: IOrdering<T>;
    readonly metrics: MetricsCounter;
    readonly recorder: TraceRecorder<T> | undefined;
}

//
// Checks the capability and preconditions, frames the search with INIT and FOUND / NOT_FOUND
// steps and leaves the traversal to subclasses.
//
export abstract class SearchingAlgorithm implements ISearchingAlgorithm {
    abstract readonly descriptor: ISearchDescriptor;

    get requiresOrderedInput(): boolean {
        return this.descriptor.requiresOrderedInput;
    }

    search<T>(elements: readonly T[], target: T, ordering: IOrdering<T>, metrics: MetricsCounter, recorder?: TraceRecorder<T>): number | undefined {
        assertDomainSupported(this.descriptor, ordering.domain);
        this.checkPreconditions(elements, target, ordering);

        recorder?.recordInitial(elements, `${this.descriptor.name} for ${target}`);
        const index = this.searchElements(elements, { target, ordering, metrics, recorder });
        if (index !== undefined) {
            recorder?.recordFound(elements, index, `Found ${target} at index ${index}`);
        }
        else {
            recorder?.recordNotFound(elements, `${target} not found`);
        }

        return index;
    }

    //
    // Throws PreconditionError when the input can't be searched by this algorithm.
    //
    protected checkPreconditions<T>(elements: readonly T[], target: T, ordering: IOrdering<T>): void {
        // Most searches accept any input of a supported domain.
    }

    protected abstract searchElements<T>(elements: readonly T[], run: ISearchRun<T>): number | undefined;
}
