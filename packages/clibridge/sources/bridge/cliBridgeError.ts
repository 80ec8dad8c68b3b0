export type CliBridgeErrorKind = "spawn_failure" | "non_zero_exit" | "backend_overflow" | "aborted";

export type CliBridgeErrorOptions = {
    details?: string;
    exitCode?: number | null;
    signal?: NodeJS.Signals | null;
    cause?: unknown;
};

/**
 * Error raised by a single CLI invocation.
 * Expects: kind is stable so callers can react (shrink history on backend_overflow,
 * surface spawn_failure as a configuration problem).
 */
export class CliBridgeError extends Error {
    readonly kind: CliBridgeErrorKind;
    readonly details?: string;
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;

    constructor(kind: CliBridgeErrorKind, message: string, options: CliBridgeErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "CliBridgeError";
        this.kind = kind;
        this.details = options.details;
        this.exitCode = options.exitCode ?? null;
        this.signal = options.signal ?? null;
    }
}

export function cliBridgeErrorIs(error: unknown, kind?: CliBridgeErrorKind): error is CliBridgeError {
    return error instanceof CliBridgeError && (kind === undefined || error.kind === kind);
}
