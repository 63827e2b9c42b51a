import pc from "picocolors";
import { setLog, type ILog } from "utils";
import type { Colors } from "./format";

export interface ILogOptions {
    //
    // Prints run-level detail such as the metrics of every run.
    //
    verbose?: boolean;

    //
    // Prints debug output.
    //
    debug?: boolean;
}

//
// Console log for the command line. Results go to stdout uncoloured so they can be piped;
// diagnostics are coloured by level.
//
export class Log implements ILog {
    constructor(private readonly options: ILogOptions, private readonly colors: Colors = pc) {
    }

    info(message: string): void {
        console.log(message);
    }

    verbose(message: string): void {
        if (!this.options.verbose) {
            return;
        }

        console.log(this.colors.gray(message));
    }

    error(message: string): void {
        console.error(this.colors.red(message));
    }

    exception(message: string, error: Error): void {
        console.error(this.colors.red(message));
        console.error(this.colors.gray(error.stack ?? error.message));
    }

    warn(message: string): void {
        console.warn(this.colors.yellow(message));
    }

    debug(message: string): void {
        if (!this.options.debug) {
            return;
        }

        console.debug(this.colors.dim(`[debug] ${message}`));
    }
}

//
// Installs the command line log as the global log.
//
export function configureLog(options: ILogOptions): void {
    setLog(new Log(options));
}
