//
// Bad command line input: a malformed value, a missing file or an invalid setting.
// Reported as a one-line message without a stack trace.
//
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}
