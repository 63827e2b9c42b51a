import { UnknownAlgorithmError } from "algo-engine";
import { sortCommand } from "../../cmd/sort";
import { UsageError } from "../../lib/errors";
import { captureOutput, writeTestConfig, type ICapturedOutput } from "./capture-output";

describe("sort command", () => {
    let config: string;
    let output: ICapturedOutput;

    beforeAll(async () => {
        config = await writeTestConfig("sort", { maxTracedElements: 3 });
    });

    beforeEach(() => {
        output = captureOutput();
    });

    afterEach(() => {
        output.restore();
    });

    it("should print the sorted values and metrics", async () => {
        await sortCommand("bubble", ["3,1,2"], { config });

        const lines = output.lines();
        expect(lines).toHaveLength(3);
        expect(lines[0]).toBe("Bubble Sort");
        expect(lines[1]).toBe("Sorted: 1, 2, 3");
        expect(lines[2].startsWith("Comparisons: 3\nMoves: 2\nAccesses: 14\nTime: ")).toBe(true);
    });

    it("should sort words with --lexical", async () => {
        await sortCommand("merge", ["pear", "apple", "fig"], { config, lexical: true });

        expect(output.lines()[1]).toBe("Sorted: apple, fig, pear");
    });

    it("should print every step with --trace", async () => {
        await sortCommand("bubble", ["3,1,2"], { config, trace: true });

        const lines = output.lines();
        expect(lines).toHaveLength(11);
        expect(lines[0]).toBe("   #0 INIT      [3, 1, 2] Initial array for Bubble Sort");
        expect(lines[6]).toBe("   #6 COMPLETE  [1, 2, 3] Bubble Sort complete");
        expect(lines[7]).toBe("");
        expect(lines[9]).toBe("Sorted: 1, 2, 3");
    });

    it("should refuse to trace more values than the configured limit", async () => {
        await expect(sortCommand("bubble", ["4,3,2,1"], { config, trace: true }))
            .rejects.toThrow(new UsageError("--trace is limited to 3 elements, got 4."));
    });

    it("should reject an unknown algorithm", async () => {
        await expect(sortCommand("bogo", ["1"], { config })).rejects.toThrow(UnknownAlgorithmError);
    });

    it("should reject text without --lexical", async () => {
        await expect(sortCommand("quick", ["pear"], { config })).rejects.toThrow(UsageError);
    });
});
