import fs from "fs-extra";
import path from "path";
import { DOMAINS, MAX_TRACED_ELEMENTS, type Domain } from "algo-engine";
import { UsageError } from "./errors";

//
// Settings read from algo.config.json. Command line options override them.
//
export interface IAlgoConfig {
    //
    // Largest input accepted with --trace.
    //
    maxTracedElements: number;

    //
    // Seed for reproducible random choices. Unseeded when absent.
    //
    seed?: number;

    //
    // Domain used when --lexical is not given.
    //
    domain: Domain;

    //
    // Algorithms run by the compare command when none are named.
    //
    compareAlgorithms?: string[];
}

export const CONFIG_FILE_NAME = "algo.config.json";

export const DEFAULT_CONFIG: Readonly<IAlgoConfig> = Object.freeze({
    maxTracedElements: MAX_TRACED_ELEMENTS,
    domain: "ordinal",
});

function isDomain(value: unknown): value is Domain {
    return DOMAINS.some(domain => domain === value);
}

//
// Checks the parsed JSON and fills in defaults. Throws UsageError naming the first bad field.
//
export function parseConfig(raw: unknown, source: string): IAlgoConfig {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new UsageError(`${source}: expected a JSON object.`);
    }

    const fields = new Map<string, unknown>(Object.entries(raw));
    const config: IAlgoConfig = { ...DEFAULT_CONFIG };

    const maxTracedElements = fields.get("maxTracedElements");
    if (maxTracedElements !== undefined) {
        if (typeof maxTracedElements !== "number" || !Number.isInteger(maxTracedElements) || maxTracedElements < 1) {
            throw new UsageError(`${source}: maxTracedElements must be a positive integer.`);
        }
        config.maxTracedElements = maxTracedElements;
    }

    const seed = fields.get("seed");
    if (seed !== undefined) {
        if (typeof seed !== "number" || !Number.isInteger(seed)) {
            throw new UsageError(`${source}: seed must be an integer.`);
        }
        config.seed = seed;
    }

    const domain = fields.get("domain");
    if (domain !== undefined) {
        if (!isDomain(domain)) {
            throw new UsageError(`${source}: domain must be one of ${DOMAINS.join(", ")}.`);
        }
        config.domain = domain;
    }

    const compareAlgorithms = fields.get("compareAlgorithms");
    if (compareAlgorithms !== undefined) {
        if (!Array.isArray(compareAlgorithms) || !compareAlgorithms.every(name => typeof name === "string")) {
            throw new UsageError(`${source}: compareAlgorithms must be a list of algorithm names.`);
        }
        config.compareAlgorithms = compareAlgorithms.filter((name): name is string => typeof name === "string");
    }

    return config;
}

//
// Loads the configuration file.
// An explicit path must exist; otherwise algo.config.json in the working directory is used if present.
//
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<IAlgoConfig> {
    const filePath = configPath !== undefined ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);

    if (!await fs.pathExists(filePath)) {
        if (configPath !== undefined) {
            throw new UsageError(`Config file not found: ${filePath}`);
        }
        return { ...DEFAULT_CONFIG };
    }

    let raw: unknown;
    try {
        raw = await fs.readJson(filePath);
    }
    catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UsageError(`Failed to read ${filePath}: ${reason}`);
    }

    return parseConfig(raw, filePath);
}
