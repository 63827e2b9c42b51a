import type { Domain } from "./ordering";

//
// Base class for failures raised by the engine.
// All of them are raised before the working copy is touched or a step is recorded.
//
export class AlgorithmError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "AlgorithmError";
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

//
// The algorithm cannot run over the requested element domain,
// e.g. Counting Sort on text or Trie Search on numbers.
//
export class UnsupportedDomainError extends AlgorithmError {
    constructor(public readonly algorithm: string, public readonly domain: Domain, public readonly supported: readonly Domain[]) {
        super(`${algorithm} does not support ${domain} elements. Supported domains: ${supported.join(", ")}.`);
        this.name = "UnsupportedDomainError";
    }
}

//
// The input breaks a precondition of the algorithm,
// e.g. unsorted input to Binary Search or negative values to Counting Sort.
// The engine never corrects the input itself.
//
export class PreconditionError extends AlgorithmError {
    constructor(public readonly algorithm: string, reason: string) {
        super(`${algorithm}: ${reason}`);
        this.name = "PreconditionError";
    }
}

export class UnknownAlgorithmError extends AlgorithmError {
    constructor(public readonly algorithmName: string, public readonly available: readonly string[]) {
        super(`Unknown algorithm "${algorithmName}". Available: ${available.join(", ")}.`);
        this.name = "UnknownAlgorithmError";
    }
}

//
// The elements passed across the boundary don't match the declared domain,
// e.g. a string in an ordinal run or NaN.
//
export class InvalidInputError extends AlgorithmError {
    constructor(message: string) {
        super(message);
        this.name = "InvalidInputError";
    }
}
