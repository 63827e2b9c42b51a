export interface ICommandExample {
    readonly command: string;
    readonly description: string;
}

export type CommandName = "list" | "sort" | "search" | "compare" | "generate" | "analyze";

//
// Examples for each command, shown in its help.
//
export const COMMAND_EXAMPLES: Readonly<Record<CommandName, readonly ICommandExample[]>> = {
    list: [
        { command: "algo list", description: "Lists every sorting and searching algorithm." },
        { command: "algo list sort", description: "Lists the sorting algorithms only." },
    ],

    sort: [
        { command: "algo sort quick 5,2,9,1", description: "Sorts the numbers with Quick Sort." },
        { command: "algo sort merge pear apple fig --lexical", description: "Sorts words with Merge Sort." },
        { command: "algo sort bubble 3 1 2 --trace", description: "Prints every step of the sort." },
        { command: "algo sort quick 5,2,9,1 --seed 7", description: "Uses a fixed seed for the pivot choice." },
    ],

    search: [
        { command: "algo search binary 4 1,2,4,8", description: "Finds 4 with Binary Search." },
        { command: "algo search binary 4 8,1,4,2 --presort", description: "Sorts the values before searching." },
        { command: "algo search dfs 8 5,3,8,1 --graph-shape linked-list", description: "Searches a linked list view." },
        { command: "algo search trie fig pear apple fig --lexical", description: "Finds a word with a prefix tree." },
    ],

    compare: [
        { command: "algo compare 5,2,9,1,7", description: "Runs every sort on the numbers." },
        { command: "algo compare 5,2,9 --algorithms quick,merge", description: "Runs only the named sorts." },
    ],

    generate: [
        { command: "algo generate random --size 20", description: "Prints 20 random numbers." },
        { command: "algo generate nearly-sorted --size 50 --seed 1", description: "Prints a reproducible dataset." },
        { command: "algo generate sorted --size 10 --lexical", description: "Prints 10 words in order." },
    ],

    analyze: [
        { command: "algo analyze 1,2,3,5,4", description: "Describes the data and recommends algorithms." },
        { command: "algo analyze 9,4,1 --algorithm binary", description: "Warns if Binary Search doesn't fit." },
    ],
};

//
// Examples shown in the main help.
//
export const MAIN_EXAMPLES: readonly ICommandExample[] = [
    { command: "algo list", description: "Lists the available algorithms." },
    { command: "algo sort quick 5,2,9,1", description: "Sorts numbers and prints the metrics." },
    { command: "algo search binary 4 1,2,4,8", description: "Searches sorted numbers." },
    { command: "algo compare 5,2,9,1,7", description: "Compares the sorts on one input." },
];

//
// One line per example, descriptions lined up two spaces past the longest command.
//
export function formatExamplesForHelp(examples: readonly ICommandExample[]): string {
    const width = examples.reduce((longest, example) => Math.max(longest, example.command.length), 0);
    return examples
        .map(example => `  ${example.command.padEnd(width)}  ${example.description}`)
        .join("\n");
}

export function getCommandExamplesHelp(commandName: CommandName): string {
    return `\nExamples:\n${formatExamplesForHelp(COMMAND_EXAMPLES[commandName])}`;
}
