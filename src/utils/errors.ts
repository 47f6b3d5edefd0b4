// src/utils/errors.ts

export interface ErrorDetails {
    originalError?: unknown;
    [key: string]: unknown;
}

/** Base class for every error raised by codescope itself. */
export class CodescopeError extends Error {
    public readonly details: ErrorDetails;

    constructor(message: string, details: ErrorDetails = {}) {
        super(message);
        this.name = new.target.name;
        this.details = details;
    }

    get originalError(): unknown {
        return this.details.originalError;
    }
}

/**
 * Source text could not be parsed into a usable syntax tree.
 * `line` is 1-based when the parser could point at the offending construct.
 */
export class ParserError extends CodescopeError {
    public readonly line?: number;

    constructor(message: string, details: ErrorDetails & { line?: number } = {}) {
        super(message, details);
        this.line = details.line;
    }
}

export class ReportWriteError extends CodescopeError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
