import { RandomGenerator, SeededRandomGenerator, log, type IRandomGenerator } from "utils";
import type { Domain } from "algo-engine";
import { configureLog } from "./log";
import { loadConfig, type IAlgoConfig } from "./config";
import { UsageError } from "./errors";
import { parseInteger } from "./parse-values";

//
// Options shared by every command.
//
export interface IBaseCommandOptions {
    //
    // Enables verbose logging.
    //
    verbose?: boolean;

    //
    // Path of a configuration file to use instead of algo.config.json.
    //
    config?: string;

    //
    // Treats values as text instead of numbers.
    //
    lexical?: boolean;

    //
    // Seed for the random source.
    //
    seed?: string;
}

export interface ICommandContext {
    config: IAlgoConfig;
    domain: Domain;
    random: IRandomGenerator;
}

//
// Configures logging, loads the configuration and works out the domain and random source.
//
export async function initCommand(options: IBaseCommandOptions): Promise<ICommandContext> {
    configureLog({ verbose: options.verbose });

    const config = await loadConfig(options.config);
    const domain: Domain = options.lexical ? "lexical" : config.domain;
    const seed = options.seed !== undefined ? parseInteger(options.seed, "--seed") : config.seed;

    let random: IRandomGenerator;
    if (seed !== undefined) {
        log.verbose(`Using random seed ${seed}.`);
        random = new SeededRandomGenerator(seed);
    }
    else {
        random = new RandomGenerator();
    }

    return { config, domain, random };
}

//
// Traces copy the array at every step, so --trace is limited to small inputs.
//
export function checkTraceSize(count: number, config: IAlgoConfig): void {
    if (count > config.maxTracedElements) {
        throw new UsageError(`--trace is limited to ${config.maxTracedElements} elements, got ${count}.`);
    }
}
