import { listAlgorithms } from "./catalog";
import { supportsDomain } from "./descriptor";
import { runSort, type IRunOptions } from "./engine";
import { AlgorithmError } from "./errors";
import type { IMetricsSnapshot } from "./metrics";
import type { Domain } from "./ordering";

export interface IComparisonSuccess {
    readonly algorithm: string;
    readonly metrics: IMetricsSnapshot;
}

export interface IComparisonFailure {
    readonly algorithm: string;
    readonly error: AlgorithmError;
}

export type ComparisonEntry = IComparisonSuccess | IComparisonFailure;

export function isComparisonFailure(entry: ComparisonEntry): entry is IComparisonFailure {
    return "error" in entry;
}

//
// Runs each named sort on its own copy of the values.
// Successful runs come first, fewest comparisons first, then the algorithms that refused the input.
// With no names, every sort that supports the domain is run.
//
export function compareSortingAlgorithms(values: readonly (number | string)[], domain: Domain, algorithmNames?: readonly string[], options: IRunOptions = {}): ComparisonEntry[] {
    const names = algorithmNames ?? listAlgorithms("sort")
        .filter(descriptor => supportsDomain(descriptor, domain))
        .map(descriptor => descriptor.name);

    const successes: IComparisonSuccess[] = [];
    const failures: IComparisonFailure[] = [];

    for (const name of names) {
        try {
            const result = runSort(values, name, domain, options);
            successes.push({ algorithm: result.algorithm.name, metrics: result.metrics });
        }
        catch (error) {
            if (!(error instanceof AlgorithmError)) {
                throw error;
            }
            failures.push({ algorithm: name, error });
        }
    }

    successes.sort((a, b) => a.metrics.comparisons - b.metrics.comparisons);
    return [...successes, ...failures];
}
