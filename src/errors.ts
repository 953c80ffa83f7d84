// src/errors.ts

/**
 * Base class for errors the engine raises on purpose
 *
 * statusCode is the HTTP status the routes answer with.
 */
export abstract class WaitlistError extends Error {
    abstract readonly statusCode: number;
    abstract readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A precondition on current state no longer holds
 *
 * Stale read, concurrent modification, or a pairing that does not exist.
 * The caller re-fetches and decides again; the engine never retries.
 */
export class ConflictError extends WaitlistError {
    readonly statusCode = 409;
    readonly code = 'conflict';

    constructor(message: string, readonly details: Record<string, unknown> = {}) {
        super(message);
    }
}

export interface ValidationIssues {
    formErrors: string[];
    fieldErrors: Record<string, string[] | undefined>;
}

/**
 * Malformed input, rejected before any state is touched
 */
export class ValidationError extends WaitlistError {
    readonly statusCode = 400;
    readonly code = 'validation';

    constructor(
        message: string,
        readonly issues: ValidationIssues = { formErrors: [], fieldErrors: {} }
    ) {
        super(message);
    }
}
