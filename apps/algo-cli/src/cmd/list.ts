import pc from "picocolors";
import { listAlgorithms, type AlgorithmKind } from "algo-engine";
import { log } from "utils";
import { formatDescriptor } from "../lib/format";
import { initCommand, type IBaseCommandOptions } from "../lib/init-cmd";
import { UsageError } from "../lib/errors";

export interface IListCommandOptions extends IBaseCommandOptions {
}

const TITLES: Record<AlgorithmKind, string> = {
    sort: "Sorting algorithms",
    search: "Searching algorithms",
};

function parseKind(kind: string): AlgorithmKind {
    if (kind === "sort" || kind === "search") {
        return kind;
    }
    throw new UsageError(`Unknown algorithm kind "${kind}". Expected sort or search.`);
}

//
// Command that lists the algorithms with their complexity and supported domains.
//
export async function listCommand(kind: string | undefined, options: IListCommandOptions): Promise<void> {
    const { domain } = await initCommand(options);
    const kinds: AlgorithmKind[] = kind === undefined ? ["sort", "search"] : [parseKind(kind)];

    for (const current of kinds) {
        log.info(pc.bold(pc.blue(TITLES[current])));
        for (const descriptor of listAlgorithms(current)) {
            if (options.lexical && !descriptor.domains.includes(domain)) {
                continue;
            }
            log.info(`  ${formatDescriptor(descriptor)}`);
        }
        log.info("");
    }
}
