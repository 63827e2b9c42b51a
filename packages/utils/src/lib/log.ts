//
// Log used by every package in the workspace. Libraries write to `log`;
// applications decide where it goes by calling `setLog`.
//
export interface ILog {
    //
    // Results the user asked for.
    //
    info(message: string): void;

    //
    // Run-level detail, e.g. the metrics of each run or the seed in use.
    //
    verbose(message: string): void;

    error(message: string): void;
    exception(message: string, error: Error): void;
    warn(message: string): void;
    debug(message: string): void;
}

//
// Writes to the console. Verbose and debug output are dropped.
//
class ConsoleLog implements ILog {
    info(message: string): void {
        console.log(message);
    }

    verbose(_message: string): void {
    }

    error(message: string): void {
        console.error(message);
    }

    exception(message: string, error: Error): void {
        console.error(message);
        console.error(error.stack ?? error.message);
    }

    warn(message: string): void {
        console.warn(message);
    }

    debug(_message: string): void {
    }
}

export let log: ILog = new ConsoleLog();

//
// Replaces the global log, e.g. with the command line logger.
//
export function setLog(newLog: ILog): void {
    log = newLog;
}
