import pc from "picocolors";
import { isComparisonFailure, type AlgorithmDescriptor, type ComparisonEntry, type HighlightRole, type IMetricsSnapshot, type IStep } from "algo-engine";
import type { IDatasetCharacteristics, IRecommendation } from "datasets";

export type Colors = ReturnType<typeof pc.createColors>;

type Formatter = (input: string) => string;

//
// Colour used for each highlight role in a rendered step.
//
function roleColor(role: HighlightRole, colors: Colors): Formatter {
    switch (role) {
        case "compared":
        case "checked":
            return colors.yellow;
        case "swapped":
        case "written":
            return colors.magenta;
        case "found":
        case "final":
            return colors.green;
        case "boundary":
        case "mid":
        case "focus":
            return colors.cyan;
        case "inactive":
            return colors.gray;
    }
}

//
// Formats a duration in nanoseconds, e.g. "850 ns", "12.5 µs", "3.2 ms".
//
export function formatNanos(nanos: number): string {
    if (nanos < 1_000) {
        return `${nanos} ns`;
    }
    if (nanos < 1_000_000) {
        return `${(nanos / 1_000).toFixed(1)} µs`;
    }
    if (nanos < 1_000_000_000) {
        return `${(nanos / 1_000_000).toFixed(1)} ms`;
    }
    return `${(nanos / 1_000_000_000).toFixed(2)} s`;
}

export function formatMetrics(metrics: IMetricsSnapshot): string {
    return [
        `Comparisons: ${metrics.comparisons}`,
        `Moves: ${metrics.moves}`,
        `Accesses: ${metrics.accesses}`,
        `Time: ${formatNanos(metrics.elapsedNanos)}`,
    ].join("\n");
}

//
// Renders one step on a single line: sequence, operation, the array with highlighted
// elements coloured (the last role recorded for an index wins) and the note.
//
export function formatStep(step: IStep<number | string>, colors: Colors = pc): string {
    const roles = new Map<number, HighlightRole>();
    for (const highlight of step.highlights) {
        roles.set(highlight.index, highlight.role);
    }

    const elements = step.snapshot.map((value, index) => {
        const role = roles.get(index);
        const text = String(value);
        return role !== undefined ? roleColor(role, colors)(text) : text;
    });

    const sequence = `#${step.sequence}`.padStart(5);
    const operation = step.operation.padEnd(9);
    return `${colors.gray(sequence)} ${colors.bold(operation)} [${elements.join(", ")}] ${step.note}`;
}

//
// One line per descriptor: name, complexity, domains and the kind's flags.
//
export function formatDescriptor(descriptor: AlgorithmDescriptor, colors: Colors = pc): string {
    const flags = descriptor.kind === "sort"
        ? [descriptor.stable ? "stable" : "unstable", descriptor.comparisonBased ? "comparison" : "distribution"]
        : [descriptor.requiresOrderedInput ? "ordered input" : "any order", descriptor.graphBased ? "graph" : "array"];

    return `${colors.bold(descriptor.name.padEnd(22))} ${descriptor.timeComplexity.padEnd(12)} ${descriptor.spaceComplexity.padEnd(10)} ${descriptor.domains.join(", ").padEnd(17)} ${flags.join(", ")}`;
}

export function formatCharacteristics(characteristics: IDatasetCharacteristics): string {
    const lines = [
        `Domain: ${characteristics.domain}`,
        `Size: ${characteristics.size}`,
        `Sortedness: ${characteristics.sortedness.toFixed(1)}%${characteristics.sorted ? " (sorted)" : characteristics.reverseSorted ? " (reverse sorted)" : ""}`,
        `Unique values: ${characteristics.uniqueCount}`,
        `Duplicates: ${characteristics.duplicatePercentage.toFixed(1)}%`,
    ];
    if (characteristics.range !== undefined) {
        lines.push(`Range: ${characteristics.range.min} to ${characteristics.range.max} (${characteristics.range.size} values)`);
        lines.push(`Distribution: ${characteristics.distribution}`);
    }
    return lines.join("\n");
}

export function formatRecommendation(title: string, recommendation: IRecommendation, colors: Colors = pc): string {
    const lines = [
        `${colors.bold(title)}: ${colors.green(recommendation.algorithm)} ${recommendation.complexity} (${recommendation.confidence} confidence)`,
        `  ${recommendation.reason}`,
    ];
    for (const alternative of recommendation.alternatives) {
        lines.push(`  Alternative: ${alternative.algorithm} (${alternative.note})`);
    }
    for (const warning of recommendation.warnings) {
        lines.push(`  ${colors.yellow(warning)}`);
    }
    return lines.join("\n");
}

//
// Comparison results as a table, best first. Algorithms that refused the input are listed last with the reason.
//
export function formatComparison(entries: readonly ComparisonEntry[], colors: Colors = pc): string {
    const lines = [
        colors.bold(`${"Algorithm".padEnd(16)} ${"Comparisons".padStart(12)} ${"Moves".padStart(10)} ${"Accesses".padStart(10)} ${"Time".padStart(10)}`),
    ];
    for (const entry of entries) {
        if (isComparisonFailure(entry)) {
            lines.push(colors.red(`${entry.algorithm.padEnd(16)} ${entry.error.message}`));
            continue;
        }
        const metrics = entry.metrics;
        lines.push(`${entry.algorithm.padEnd(16)} ${String(metrics.comparisons).padStart(12)} ${String(metrics.moves).padStart(10)} ${String(metrics.accesses).padStart(10)} ${formatNanos(metrics.elapsedNanos).padStart(10)}`);
    }
    return lines.join("\n");
}
