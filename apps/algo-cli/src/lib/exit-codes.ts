//
// Process exit codes of the algo command.
//

export const EXIT_SUCCESS = 0;

/** An algorithm refused the input: unsupported domain, broken precondition, unknown name. */
export const EXIT_FAILURE = 1;

/** Bad arguments, options or configuration file. */
export const EXIT_USAGE = 2;

export const EXIT_UNCAUGHT_EXCEPTION = 64;
export const EXIT_UNHANDLED_REJECTION = 65;
