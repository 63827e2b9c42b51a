import { COMMAND_EXAMPLES, formatExamplesForHelp, getCommandExamplesHelp, type CommandName } from "../../examples";

describe("formatExamplesForHelp", () => {
    it("should line up descriptions past the longest command", () => {
        const text = formatExamplesForHelp([
            { command: "algo a", description: "First." },
            { command: "algo abc", description: "Second." },
        ]);

        expect(text).toBe("  algo a    First.\n  algo abc  Second.");
    });

    it("should return nothing for no examples", () => {
        expect(formatExamplesForHelp([])).toBe("");
    });
});

describe("getCommandExamplesHelp", () => {
    it("should list a command's examples under a heading", () => {
        expect(getCommandExamplesHelp("list")).toBe(
            "\nExamples:\n" +
            "  algo list       Lists every sorting and searching algorithm.\n" +
            "  algo list sort  Lists the sorting algorithms only."
        );
    });

    it("should have examples for every command, each run through algo and its own command", () => {
        const names: CommandName[] = ["list", "sort", "search", "compare", "generate", "analyze"];
        for (const name of names) {
            expect(COMMAND_EXAMPLES[name].length).toBeGreaterThan(0);
            for (const example of COMMAND_EXAMPLES[name]) {
                expect(example.command.startsWith(`algo ${name}`)).toBe(true);
            }
        }
    });
});
