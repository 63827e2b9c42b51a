import pc from "picocolors";
import { GRAPH_SHAPES, runSearch, runSearchTraced, type GraphShape, type ISearchResult, type ISearchRunOptions } from "algo-engine";
import { log } from "utils";
import { formatMetrics, formatStep } from "../lib/format";
import { checkTraceSize, initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { UsageError } from "../lib/errors";
import { parseNumber, parseValues } from "../lib/parse-values";

export interface ISearchCommandOptions extends IBaseCommandOptions {
    //
    // Prints every recorded step.
    //
    trace?: boolean;

    //
    // Sorts the values before searching.
    //
    presort?: boolean;

    //
    // Graph view searched by Depth-First and Breadth-First Search.
    //
    graphShape?: string;
}

export function parseGraphShape(text: string): GraphShape {
    const shape = GRAPH_SHAPES.find(candidate => candidate === text);
    if (shape === undefined) {
        throw new UsageError(`Unknown graph shape "${text}". Expected one of ${GRAPH_SHAPES.join(", ")}.`);
    }
    return shape;
}

//
// Command that searches the values for the target and prints where it was found.
//
export async function searchCommand(algorithm: string, target: string, inputs: string[], options: ISearchCommandOptions): Promise<void> {
    const { config, domain, random } = await initCommand(options);
    const { values, domain: valueDomain } = parseValues(inputs, domain);
    const targetValue = valueDomain === "ordinal" ? parseNumber(target) : target;

    const runOptions: ISearchRunOptions = {
        random,
        presort: options.presort,
        graphShape: options.graphShape !== undefined ? parseGraphShape(options.graphShape) : undefined,
    };

    let result: ISearchResult<number> | ISearchResult<string>;
    if (options.trace) {
        checkTraceSize(values.length, config);
        const traced = runSearchTraced(values, algorithm, valueDomain, targetValue, runOptions);
        for (const step of traced.trace) {
            log.info(formatStep(step));
        }
        log.info("");
        result = traced;
    }
    else {
        result = runSearch(values, algorithm, valueDomain, targetValue, runOptions);
    }

    log.info(pc.bold(result.algorithm.name));
    if (options.presort) {
        log.info(`Searched: ${result.searchedElements.join(", ")}`);
    }
    if (result.foundIndex !== undefined) {
        log.info(pc.green(`Found ${target} at index ${result.foundIndex}`));
    }
    else {
        log.info(pc.yellow(`${target} not found`));
    }
    log.info(formatMetrics(result.metrics));
}
