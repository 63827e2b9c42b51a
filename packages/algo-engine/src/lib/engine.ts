import { log, type IClock } from "utils";
import { createSearchingAlgorithm, createSortingAlgorithm, type IAlgorithmOptions } from "./catalog";
import type { ISearchDescriptor, ISortDescriptor } from "./descriptor";
import { InvalidInputError } from "./errors";
import { MetricsCounter, type IMetricsSnapshot } from "./metrics";
import { lexicalOrdering, ordinalOrdering, type Domain, type IOrdering } from "./ordering";
import type { Trace } from "./trace/step";
import { TraceRecorder } from "./trace/trace-recorder";

//
// Largest input a caller should hand to a traced run.
// Traces of quadratic algorithms grow with the square of the input.
//
export const MAX_TRACED_ELEMENTS = 100;

export interface IRunOptions extends IAlgorithmOptions {
    //
    // Clock used for the elapsed time in the metrics.
    //
    readonly clock?: IClock;
}

export interface ISearchRunOptions extends IRunOptions {
    //
    // Sort the working copy before searching. The sort is not instrumented,
    // so the metrics and trace cover the search alone.
    //
    readonly presort?: boolean;
}

export interface ISortResult<T> {
    readonly algorithm: ISortDescriptor;
    readonly sortedElements: T[];
    readonly metrics: IMetricsSnapshot;
}

export interface ITracedSortResult<T> extends ISortResult<T> {
    readonly trace: Trace<T>;
}

export interface ISearchResult<T> {
    readonly algorithm: ISearchDescriptor;

    //
    // The array that was searched: a copy of the input, sorted when presort was requested.
    // foundIndex is an index into this array.
    //
    readonly searchedElements: T[];

    readonly foundIndex: number | undefined;
    readonly found: boolean;
    readonly metrics: IMetricsSnapshot;
}

export interface ITracedSearchResult<T> extends ISearchResult<T> {
    readonly trace: Trace<T>;
}

//
// The caller's elements, validated and copied, tagged with their domain.
//
export type DomainValues =
    | { readonly domain: "ordinal"; readonly values: number[] }
    | { readonly domain: "lexical"; readonly values: string[] };

function describeValue(value: unknown): string {
    return typeof value === "string" ? `"${value}"` : String(value);
}

function toOrdinal(value: unknown, where: string): number {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new InvalidInputError(`Expected a finite number ${where}, got ${describeValue(value)}.`);
    }
    return value;
}

function toLexical(value: unknown, where: string): string {
    if (typeof value !== "string") {
        throw new InvalidInputError(`Expected text ${where}, got ${describeValue(value)}.`);
    }
    return value;
}

//
// Checks every element belongs to the declared domain and returns an owned copy.
// Throws InvalidInputError for the first element that doesn't.
//
export function toDomainValues(elements: readonly unknown[], domain: Domain): DomainValues {
    if (domain === "ordinal") {
        return { domain, values: elements.map((value, index) => toOrdinal(value, `at index ${index}`)) };
    }
    return { domain, values: elements.map((value, index) => toLexical(value, `at index ${index}`)) };
}

function executeSort<T>(values: T[], ordering: IOrdering<T>, algorithmName: string, options: IRunOptions, recorder?: TraceRecorder<T>): ISortResult<T> {
    const algorithm = createSortingAlgorithm(algorithmName, options);
    const metrics = new MetricsCounter(options.clock);

    metrics.startTiming();
    try {
        algorithm.sort(values, ordering, metrics, recorder);
    }
    finally {
        metrics.stopTiming();
    }

    const snapshot = metrics.snapshot();
    log.verbose(`${algorithm.descriptor.name} sorted ${values.length} ${ordering.domain} elements: ${snapshot.comparisons} comparisons, ${snapshot.moves} moves, ${snapshot.accesses} accesses.`);

    return { algorithm: algorithm.descriptor, sortedElements: values, metrics: snapshot };
}

function executeSearch<T>(values: T[], target: T, ordering: IOrdering<T>, algorithmName: string, options: ISearchRunOptions, recorder?: TraceRecorder<T>): ISearchResult<T> {
    const algorithm = createSearchingAlgorithm(algorithmName, options);
    if (options.presort) {
        values.sort((a, b) => ordering.compare(a, b));
    }

    const metrics = new MetricsCounter(options.clock);
    let foundIndex: number | undefined;

    metrics.startTiming();
    try {
        foundIndex = algorithm.search(values, target, ordering, metrics, recorder);
    }
    finally {
        metrics.stopTiming();
    }

    const snapshot = metrics.snapshot();
    const outcome = foundIndex !== undefined ? `found at index ${foundIndex}` : "not found";
    log.verbose(`${algorithm.descriptor.name} over ${values.length} ${ordering.domain} elements: ${outcome}, ${snapshot.comparisons} comparisons.`);

    return {
        algorithm: algorithm.descriptor,
        searchedElements: values,
        foundIndex,
        found: foundIndex !== undefined,
        metrics: snapshot,
    };
}

//
// Sorts a copy of the elements with the named algorithm. The caller's array is never touched.
//
export function runSort(elements: readonly number[], algorithmName: string, domain: "ordinal", options?: IRunOptions): ISortResult<number>;
export function runSort(elements: readonly string[], algorithmName: string, domain: "lexical", options?: IRunOptions): ISortResult<string>;
export function runSort(elements: readonly (number | string)[], algorithmName: string, domain: Domain, options?: IRunOptions): ISortResult<number> | ISortResult<string>;
export function runSort(elements: readonly unknown[], algorithmName: string, domain: Domain, options: IRunOptions = {}): ISortResult<number> | ISortResult<string> {
    const input = toDomainValues(elements, domain);
    if (input.domain === "ordinal") {
        return executeSort(input.values, ordinalOrdering, algorithmName, options);
    }
    return executeSort(input.values, lexicalOrdering, algorithmName, options);
}

//
// Like runSort, also recording every step. Callers should keep the input within MAX_TRACED_ELEMENTS.
//
export function runSortTraced(elements: readonly number[], algorithmName: string, domain: "ordinal", options?: IRunOptions): ITracedSortResult<number>;
export function runSortTraced(elements: readonly string[], algorithmName: string, domain: "lexical", options?: IRunOptions): ITracedSortResult<string>;
export function runSortTraced(elements: readonly (number | string)[], algorithmName: string, domain: Domain, options?: IRunOptions): ITracedSortResult<number> | ITracedSortResult<string>;
export function runSortTraced(elements: readonly unknown[], algorithmName: string, domain: Domain, options: IRunOptions = {}): ITracedSortResult<number> | ITracedSortResult<string> {
    const input = toDomainValues(elements, domain);
    if (input.domain === "ordinal") {
        const recorder = new TraceRecorder<number>();
        const result = executeSort(input.values, ordinalOrdering, algorithmName, options, recorder);
        return { ...result, trace: recorder.toTrace() };
    }
    const recorder = new TraceRecorder<string>();
    const result = executeSort(input.values, lexicalOrdering, algorithmName, options, recorder);
    return { ...result, trace: recorder.toTrace() };
}

//
// Searches a copy of the elements for the target. Not finding it is a normal result.
//
export function runSearch(elements: readonly number[], algorithmName: string, domain: "ordinal", target: number, options?: ISearchRunOptions): ISearchResult<number>;
export function runSearch(elements: readonly string[], algorithmName: string, domain: "lexical", target: string, options?: ISearchRunOptions): ISearchResult<string>;
export function runSearch(elements: readonly (number | string)[], algorithmName: string, domain: Domain, target: number | string, options?: ISearchRunOptions): ISearchResult<number> | ISearchResult<string>;
export function runSearch(elements: readonly unknown[], algorithmName: string, domain: Domain, target: unknown, options: ISearchRunOptions = {}): ISearchResult<number> | ISearchResult<string> {
    const input = toDomainValues(elements, domain);
    if (input.domain === "ordinal") {
        return executeSearch(input.values, toOrdinal(target, "as the target"), ordinalOrdering, algorithmName, options);
    }
    return executeSearch(input.values, toLexical(target, "as the target"), lexicalOrdering, algorithmName, options);
}

//
// Like runSearch, also recording every step.
//
export function runSearchTraced(elements: readonly number[], algorithmName: string, domain: "ordinal", target: number, options?: ISearchRunOptions): ITracedSearchResult<number>;
export function runSearchTraced(elements: readonly string[], algorithmName: string, domain: "lexical", target: string, options?: ISearchRunOptions): ITracedSearchResult<string>;
export function runSearchTraced(elements: readonly (number | string)[], algorithmName: string, domain: Domain, target: number | string, options?: ISearchRunOptions): ITracedSearchResult<number> | ITracedSearchResult<string>;
export function runSearchTraced(elements: readonly unknown[], algorithmName: string, domain: Domain, target: unknown, options: ISearchRunOptions = {}): ITracedSearchResult<number> | ITracedSearchResult<string> {
    const input = toDomainValues(elements, domain);
    if (input.domain === "ordinal") {
        const recorder = new TraceRecorder<number>();
        const result = executeSearch(input.values, toOrdinal(target, "as the target"), ordinalOrdering, algorithmName, options, recorder);
        return { ...result, trace: recorder.toTrace() };
    }
    const recorder = new TraceRecorder<string>();
    const result = executeSearch(input.values, toLexical(target, "as the target"), lexicalOrdering, algorithmName, options, recorder);
    return { ...result, trace: recorder.toTrace() };
}
