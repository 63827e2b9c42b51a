import pc from "picocolors";
import { findSearchDescriptor, findSortDescriptor, InvalidInputError, type IStep } from "algo-engine";
import type { IDatasetCharacteristics, IRecommendation } from "datasets";
import {
    formatCharacteristics,
    formatComparison,
    formatDescriptor,
    formatMetrics,
    formatNanos,
    formatRecommendation,
    formatStep,
} from "../../lib/format";

const plain = pc.createColors(false);

describe("formatNanos", () => {
    it("should format nanoseconds", () => {
        expect(formatNanos(850)).toBe("850 ns");
    });

    it("should format microseconds", () => {
        expect(formatNanos(12_500)).toBe("12.5 µs");
    });

    it("should format milliseconds", () => {
        expect(formatNanos(3_200_000)).toBe("3.2 ms");
    });

    it("should format seconds", () => {
        expect(formatNanos(2_500_000_000)).toBe("2.50 s");
    });
});

describe("formatMetrics", () => {
    it("should print one counter per line", () => {
        const text = formatMetrics({ comparisons: 3, moves: 2, accesses: 14, elapsedNanos: 850 });
        expect(text).toBe("Comparisons: 3\nMoves: 2\nAccesses: 14\nTime: 850 ns");
    });
});

describe("formatStep", () => {
    const step: IStep<number> = {
        sequence: 2,
        snapshot: [1, 3, 2],
        operation: "COMPARE",
        highlights: [{ index: 1, role: "compared" }, { index: 2, role: "compared" }],
        note: "Compare 3 and 2",
    };

    it("should print the sequence, operation, snapshot and note", () => {
        expect(formatStep(step, plain)).toBe("   #2 COMPARE   [1, 3, 2] Compare 3 and 2");
    });

    it("should colour highlighted elements by role", () => {
        const colors = pc.createColors(true);
        const line = formatStep(step, colors);
        expect(line).toContain(`[1, ${colors.yellow("3")}, ${colors.yellow("2")}]`);
    });

    it("should use the last role recorded for an index", () => {
        const colors = pc.createColors(true);
        const found: IStep<string> = {
            sequence: 0,
            snapshot: ["a"],
            operation: "FOUND",
            highlights: [{ index: 0, role: "checked" }, { index: 0, role: "found" }],
            note: "Found a at index 0",
        };
        expect(formatStep(found, colors)).toContain(`[${colors.green("a")}]`);
    });
});

describe("formatDescriptor", () => {
    it("should print the flags of a sort", () => {
        const line = formatDescriptor(findSortDescriptor("bubble"), plain);
        expect(line.startsWith("Bubble Sort ")).toBe(true);
        expect(line).toContain("ordinal, lexical");
        expect(line.endsWith("stable, comparison")).toBe(true);
    });

    it("should print the flags of a search", () => {
        const line = formatDescriptor(findSearchDescriptor("binary"), plain);
        expect(line.endsWith("ordered input, array")).toBe(true);
    });
});

describe("formatCharacteristics", () => {
    it("should include the range and distribution for numbers", () => {
        const characteristics: IDatasetCharacteristics = {
            domain: "ordinal",
            size: 4,
            sortedness: 100,
            sorted: true,
            reverseSorted: false,
            uniqueCount: 3,
            hasDuplicates: true,
            duplicatePercentage: 25,
            range: { min: 1, max: 3, size: 3, integers: true },
            distribution: "random",
        };

        expect(formatCharacteristics(characteristics)).toBe([
            "Domain: ordinal",
            "Size: 4",
            "Sortedness: 100.0% (sorted)",
            "Unique values: 3",
            "Duplicates: 25.0%",
            "Range: 1 to 3 (3 values)",
            "Distribution: random",
        ].join("\n"));
    });

    it("should leave out the range for text", () => {
        const characteristics: IDatasetCharacteristics = {
            domain: "lexical",
            size: 3,
            sortedness: 0,
            sorted: false,
            reverseSorted: true,
            uniqueCount: 3,
            hasDuplicates: false,
            duplicatePercentage: 0,
            distribution: "random",
        };

        expect(formatCharacteristics(characteristics)).toBe([
            "Domain: lexical",
            "Size: 3",
            "Sortedness: 0.0% (reverse sorted)",
            "Unique values: 3",
            "Duplicates: 0.0%",
        ].join("\n"));
    });
});

describe("formatRecommendation", () => {
    it("should list the alternatives and warnings", () => {
        const recommendation: IRecommendation = {
            algorithm: "Quick Sort",
            reason: "General purpose data.",
            complexity: "O(n log n)",
            confidence: "medium",
            alternatives: [{ algorithm: "Merge Sort", note: "stable" }],
            warnings: ["Watch out."],
        };

        expect(formatRecommendation("Sorting", recommendation, plain)).toBe([
            "Sorting: Quick Sort O(n log n) (medium confidence)",
            "  General purpose data.",
            "  Alternative: Merge Sort (stable)",
            "  Watch out.",
        ].join("\n"));
    });
});

describe("formatComparison", () => {
    it("should list successes then failures", () => {
        const text = formatComparison([
            { algorithm: "Merge Sort", metrics: { comparisons: 5, moves: 6, accesses: 12, elapsedNanos: 400 } },
            { algorithm: "counting", error: new InvalidInputError("No.") },
        ], plain);

        const lines = text.split("\n");
        expect(lines).toHaveLength(3);
        expect(lines[1]).toBe(`${"Merge Sort".padEnd(16)} ${"5".padStart(12)} ${"6".padStart(10)} ${"12".padStart(10)} ${"400 ns".padStart(10)}`);
        expect(lines[2]).toBe(`${"counting".padEnd(16)} No.`);
    });
});
