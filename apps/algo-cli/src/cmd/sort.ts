import pc from "picocolors";
import { runSort, runSortTraced } from "algo-engine";
import { log } from "utils";
import { formatMetrics, formatStep } from "../lib/format";
import { checkTraceSize, initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { parseValues } from "../lib/parse-values";

export interface ISortCommandOptions extends IBaseCommandOptions {
    //
    // Prints every recorded step.
    //
    trace?: boolean;
}

//
// Command that sorts the values with the named algorithm and prints the result and metrics.
//
export async function sortCommand(algorithm: string, inputs: string[], options: ISortCommandOptions): Promise<void> {
    const { config, domain, random } = await initCommand(options);
    const { values, domain: valueDomain } = parseValues(inputs, domain);

    if (options.trace) {
        checkTraceSize(values.length, config);
        const result = runSortTraced(values, algorithm, valueDomain, { random });
        for (const step of result.trace) {
            log.info(formatStep(step));
        }
        log.info("");
        log.info(pc.bold(result.algorithm.name));
        log.info(`Sorted: ${result.sortedElements.join(", ")}`);
        log.info(formatMetrics(result.metrics));
        return;
    }

    const result = runSort(values, algorithm, valueDomain, { random });
    log.info(pc.bold(result.algorithm.name));
    log.info(`Sorted: ${result.sortedElements.join(", ")}`);
    log.info(formatMetrics(result.metrics));
}
