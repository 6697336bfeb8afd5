/**
 * Error hierarchy for the salience engine.
 * Every failure is raised synchronously at the boundary of the operation that detects it.
 */

export type SalienceErrorCode =
    | "CONFIGURATION_ERROR"   // Unknown column, invalid k, malformed dataset or env
    | "EMPTY_CORPUS"          // IDF or ranking requested over zero documents
    | "TERM_NOT_IN_CORPUS";   // IDF requested for a term with document frequency 0

/**
 * Base class for all engine errors
 */
export class SalienceError extends Error {
    public readonly code: SalienceErrorCode;
    public readonly context: Record<string, unknown> | undefined;

    constructor(message: string, code: SalienceErrorCode, context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.context = context;

        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends SalienceError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "CONFIGURATION_ERROR", context);
    }
}

export class EmptyCorpusError extends SalienceError {
    constructor(operation: string) {
        super(`Cannot run ${operation} over an empty corpus`, "EMPTY_CORPUS", { operation });
    }
}

export class TermNotInCorpusError extends SalienceError {
    public readonly term: string;

    constructor(term: string) {
        super(`Term "${term}" does not appear in any document of the corpus`, "TERM_NOT_IN_CORPUS", { term });
        this.term = term;
    }
}

export function isSalienceError(error: unknown): error is SalienceError {
    return error instanceof SalienceError;
}
