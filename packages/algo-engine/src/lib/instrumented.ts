import type { Comparison, IOrdering } from "./ordering";
import type { MetricsCounter } from "./metrics";

//
// Three-way comparison routed through the ordering and tallied on the metrics counter.
// Every algorithm compares elements through these helpers and nothing else.
//
export function compareCounted<T>(ordering: IOrdering<T>, metrics: MetricsCounter, a: T, b: T): Comparison {
    metrics.recordComparison();
    return ordering.compare(a, b);
}

export function isGreater<T>(ordering: IOrdering<T>, metrics: MetricsCounter, a: T, b: T): boolean {
    return compareCounted(ordering, metrics, a, b) > 0;
}

export function isLess<T>(ordering: IOrdering<T>, metrics: MetricsCounter, a: T, b: T): boolean {
    return compareCounted(ordering, metrics, a, b) < 0;
}

export function isLessOrEqual<T>(ordering: IOrdering<T>, metrics: MetricsCounter, a: T, b: T): boolean {
    return compareCounted(ordering, metrics, a, b) <= 0;
}

export function isEqual<T>(ordering: IOrdering<T>, metrics: MetricsCounter, a: T, b: T): boolean {
    return compareCounted(ordering, metrics, a, b) === 0;
}

//
// Swaps two slots of the working array: one move, two reads and two writes.
//
export function swap<T>(elements: T[], i: number, j: number, metrics: MetricsCounter): void {
    const temp = elements[i];
    elements[i] = elements[j];
    elements[j] = temp;
    metrics.recordMove();
    metrics.recordAccess(4);
}
