import pc from "picocolors";
import { algorithmWarning, analyzeDataset, recommendSearchingAlgorithm, recommendSortingAlgorithm } from "datasets";
import { log } from "utils";
import { formatCharacteristics, formatRecommendation } from "../lib/format";
import { initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { parseValues } from "../lib/parse-values";

export interface IAnalyzeCommandOptions extends IBaseCommandOptions {
    //
    // Algorithm to check against the data.
    //
    algorithm?: string;
}

//
// Command that describes the values and recommends a sorting and a searching algorithm for them.
//
export async function analyzeCommand(inputs: string[], options: IAnalyzeCommandOptions): Promise<void> {
    const { domain } = await initCommand(options);
    const { values, domain: valueDomain } = parseValues(inputs, domain);
    const characteristics = analyzeDataset(values, valueDomain);

    log.info(pc.bold(pc.blue("Dataset")));
    log.info(formatCharacteristics(characteristics));
    log.info("");
    log.info(formatRecommendation("Sorting", recommendSortingAlgorithm(characteristics)));
    log.info(formatRecommendation("Searching", recommendSearchingAlgorithm(characteristics)));

    if (options.algorithm !== undefined) {
        const warning = algorithmWarning(options.algorithm, characteristics);
        log.info("");
        if (warning !== undefined) {
            log.warn(warning);
        }
        else {
            log.info(pc.green(`No problems found for ${options.algorithm}.`));
        }
    }
}
