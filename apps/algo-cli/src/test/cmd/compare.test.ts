import { compareCommand } from "../../cmd/compare";
import { captureOutput, writeTestConfig, type ICapturedOutput } from "./capture-output";

describe("compare command", () => {
    let config: string;
    let output: ICapturedOutput;

    beforeAll(async () => {
        config = await writeTestConfig("compare", { compareAlgorithms: ["insertion"] });
    });

    beforeEach(() => {
        output = captureOutput();
    });

    afterEach(() => {
        output.restore();
    });

    function tableRows(): string[] {
        return output.lines().join("\n").split("\n").slice(1);
    }

    it("should rank the named algorithms by comparisons", async () => {
        await compareCommand(["3,1,2"], { config, algorithms: "bubble,counting" });

        const rows = tableRows();
        expect(rows).toHaveLength(2);
        expect(rows[0].startsWith("Counting Sort ")).toBe(true);
        expect(rows[1].startsWith("Bubble Sort ")).toBe(true);
    });

    it("should list algorithms that refuse the input last", async () => {
        await compareCommand(["pear,fig"], { config, lexical: true, algorithms: "heap,merge" });

        const rows = tableRows();
        expect(rows[0].startsWith("Merge Sort ")).toBe(true);
        expect(rows[1]).toBe(`${"heap".padEnd(16)} Heap Sort does not support lexical elements. Supported domains: ordinal.`);
    });

    it("should fall back to the configured algorithms", async () => {
        await compareCommand(["3,1,2"], { config });

        const rows = tableRows();
        expect(rows).toHaveLength(1);
        expect(rows[0].startsWith("Insertion Sort ")).toBe(true);
    });
});
