#!/usr/bin/env node

import { CommanderError, program } from 'commander';
import pc from "picocolors";
import { AlgorithmError } from "algo-engine";
import { listCommand } from './cmd/list';
import { sortCommand } from './cmd/sort';
import { searchCommand } from './cmd/search';
import { compareCommand } from './cmd/compare';
import { generateCommand } from './cmd/generate';
import { analyzeCommand } from './cmd/analyze';
import { MAIN_EXAMPLES, formatExamplesForHelp, getCommandExamplesHelp } from './examples';
import { UsageError } from './lib/errors';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_UNCAUGHT_EXCEPTION, EXIT_UNHANDLED_REJECTION, EXIT_USAGE } from './lib/exit-codes';

async function main(): Promise<void> {

    const verboseOption: [string, string, boolean] = ["-v, --verbose", "Enables verbose logging.", false];
    const configOption: [string, string] = ["--config <file>", "Configuration file to use instead of ./algo.config.json."];
    const lexicalOption: [string, string, boolean] = ["--lexical", "Treats the values as text instead of numbers.", false];
    const traceOption: [string, string, boolean] = ["--trace", "Prints every step of the run.", false];
    const seedOption: [string, string] = ["--seed <n>", "Seed for the random source, for reproducible runs."];

    program
        .name("algo")
        .description("Runs sorting and searching algorithms and shows what they did.")
        .version('0.0.1')
        .addHelpText('after', `

Getting help:
  ${pc.bold("algo <command> --help")}    Shows help for a particular command.

Examples:
${formatExamplesForHelp(MAIN_EXAMPLES)}`)
        .exitOverride();  // Prevent commander from calling process.exit

    program
        .command("list")
        .description("Lists the available algorithms.")
        .argument("[kind]", "sort or search")
        .option(...lexicalOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('list'))
        .action(listCommand);

    program
        .command("sort")
        .description("Sorts values with the named algorithm.")
        .argument("<algorithm>", "Algorithm name, e.g. quick or \"Merge Sort\".")
        .argument("<values...>", "Values separated by commas or spaces.")
        .option(...lexicalOption)
        .option(...traceOption)
        .option(...seedOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('sort'))
        .action(sortCommand);

    program
        .command("search")
        .description("Searches values for a target with the named algorithm.")
        .argument("<algorithm>", "Algorithm name, e.g. binary or dfs.")
        .argument("<target>", "The value to find.")
        .argument("<values...>", "Values separated by commas or spaces.")
        .option(...lexicalOption)
        .option(...traceOption)
        .option("--presort", "Sorts the values before searching.", false)
        .option("--graph-shape <shape>", "Graph view for dfs and bfs: binary-search-tree, complete-binary-tree or linked-list.")
        .option(...seedOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('search'))
        .action(searchCommand);

    program
        .command("compare")
        .description("Runs several sorts on the same values and ranks them by comparisons.")
        .argument("<values...>", "Values separated by commas or spaces.")
        .option("--algorithms <names>", "Comma separated algorithm names. Defaults to every sort for the domain.")
        .option(...lexicalOption)
        .option(...seedOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('compare'))
        .action(compareCommand);

    program
        .command("generate")
        .description("Generates a dataset: random, sorted, reversed, nearly-sorted or few-unique.")
        .argument("<pattern>", "The arrangement of the values.")
        .option("--size <n>", "Number of values.", "20")
        .option("--min <n>", "Smallest number.")
        .option("--max <n>", "Largest number.")
        .option("--swap-percentage <n>", "Share of values swapped out of place for nearly-sorted.")
        .option("--unique-count <n>", "Number of distinct values for few-unique.")
        .option(...lexicalOption)
        .option(...seedOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('generate'))
        .action(generateCommand);

    program
        .command("analyze")
        .description("Describes the values and recommends algorithms for them.")
        .argument("<values...>", "Values separated by commas or spaces.")
        .option("--algorithm <name>", "Checks whether the algorithm suits the values.")
        .option(...lexicalOption)
        .option(...verboseOption)
        .option(...configOption)
        .addHelpText('after', getCommandExamplesHelp('analyze'))
        .action(analyzeCommand);

    try {
        await program.parseAsync(process.argv);
    }
    catch (err) {
        if (!(err instanceof CommanderError)) {
            throw err;
        }

        if (err.code === 'commander.help'
            || err.code === 'commander.helpDisplayed'
            || err.code === 'commander.version') {
            process.exit(EXIT_SUCCESS);
        }

        if (err.code === 'commander.missingArgument'
            || err.code === 'commander.unknownOption'
            || err.code === 'commander.unknownCommand'
            || err.code === 'commander.excessArguments') {
            process.exit(EXIT_USAGE);
        }

        process.exit(err.exitCode);
    }
}

//
// Usage and algorithm errors print their message; anything else prints the stack.
//
function handleError(error: unknown, exitCode: number): void {
    if (error instanceof UsageError) {
        console.error(pc.red(error.message));
        process.exit(EXIT_USAGE);
    }

    if (error instanceof AlgorithmError) {
        console.error(pc.red(error.message));
        process.exit(EXIT_FAILURE);
    }

    console.error(pc.red('An error occurred:'));
    if (error instanceof Error) {
        console.error(pc.red(error.stack ?? error.message));
    }
    else {
        console.error(pc.red(String(error)));
    }
    process.exit(exitCode);
}

process.on('uncaughtException', (error) => {
    handleError(error, EXIT_UNCAUGHT_EXCEPTION);
});

process.on('unhandledRejection', (reason) => {
    handleError(reason, EXIT_UNHANDLED_REJECTION);
});

main()
    .catch((error: unknown) => {
        handleError(error, EXIT_FAILURE);
    });
