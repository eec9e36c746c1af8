/**
 * Typed failures raised by the engine.
 *
 * An empty retrieval is not an error; it is carried on the bundle as `grounded: false`.
 */

export type ErrorCode = 'DATA_UNAVAILABLE' | 'INVALID_INPUT' | 'UPSTREAM_GENERATION_FAILURE';

export interface ErrorPayload {
    status: 'error';
    error_code: ErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
}

interface CetMentorErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown>;
}

export class CetMentorError extends Error {
    readonly code: ErrorCode;
    readonly retryable: boolean;
    readonly details?: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, retryable: boolean, options: CetMentorErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
        this.retryable = retryable;
        this.details = options.details;
    }

    toJSON(): ErrorPayload {
        return {
            status: 'error',
            error_code: this.code,
            message: this.message,
            retryable: this.retryable,
            ...(this.details ? { details: this.details } : {}),
        };
    }
}

/**
 * Knowledge base missing, unreadable or empty. Fatal at startup, recoverable by reload.
 */
export class DataUnavailableError extends CetMentorError {
    constructor(message: string, options?: CetMentorErrorOptions) {
        super('DATA_UNAVAILABLE', message, true, options);
    }
}

/**
 * Malformed rank or percentile. The message is phrased as a question back to the student.
 */
export class InvalidInputError extends CetMentorError {
    constructor(message: string, options?: CetMentorErrorOptions) {
        super('INVALID_INPUT', message, false, options);
    }
}

export class UpstreamGenerationError extends CetMentorError {
    constructor(message: string, options?: CetMentorErrorOptions) {
        super('UPSTREAM_GENERATION_FAILURE', message, true, options);
    }
}
