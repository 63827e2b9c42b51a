import { compareSortingAlgorithms } from "algo-engine";
import { log } from "utils";
import { formatComparison } from "../lib/format";
import { initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { parseValues, splitValues } from "../lib/parse-values";

export interface ICompareCommandOptions extends IBaseCommandOptions {
    //
    // Comma separated algorithm names.
    //
    algorithms?: string;
}

//
// Command that runs several sorts over the same values and ranks them by comparisons.
//
export async function compareCommand(inputs: string[], options: ICompareCommandOptions): Promise<void> {
    const { config, domain, random } = await initCommand(options);
    const { values, domain: valueDomain } = parseValues(inputs, domain);
    const names = options.algorithms !== undefined ? splitValues([options.algorithms]) : config.compareAlgorithms;

    log.verbose(`Comparing ${names !== undefined ? names.join(", ") : "every sort"} on ${values.length} elements.`);

    const entries = compareSortingAlgorithms(values, valueDomain, names, { random });
    log.info(formatComparison(entries));
}
