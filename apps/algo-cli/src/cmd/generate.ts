import { DATASET_PATTERNS, DatasetGenerator, isDatasetPattern, type IGenerateOptions } from "datasets";
import { log } from "utils";
import { initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { UsageError } from "../lib/errors";
import { parseInteger } from "../lib/parse-values";

export interface IGenerateCommandOptions extends IBaseCommandOptions {
    size: string;
    min?: string;
    max?: string;
    swapPercentage?: string;
    uniqueCount?: string;
}

function optionalInteger(text: string | undefined, option: string): number | undefined {
    return text !== undefined ? parseInteger(text, option) : undefined;
}

//
// Command that prints a generated dataset as comma separated values, ready to pass to the other commands.
//
export async function generateCommand(pattern: string, options: IGenerateCommandOptions): Promise<void> {
    const { domain, random } = await initCommand(options);
    if (!isDatasetPattern(pattern)) {
        throw new UsageError(`Unknown pattern "${pattern}". Expected one of ${DATASET_PATTERNS.join(", ")}.`);
    }

    const generateOptions: IGenerateOptions = {
        size: parseInteger(options.size, "--size"),
        min: optionalInteger(options.min, "--min"),
        max: optionalInteger(options.max, "--max"),
        swapPercentage: optionalInteger(options.swapPercentage, "--swap-percentage"),
        uniqueCount: optionalInteger(options.uniqueCount, "--unique-count"),
    };

    const generator = new DatasetGenerator(random);
    const values = domain === "lexical"
        ? generator.words(pattern, generateOptions)
        : generator.numbers(pattern, generateOptions);

    log.verbose(`Generated ${values.length} ${domain} values (${pattern}).`);
    log.info(values.join(","));
}
