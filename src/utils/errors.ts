/**
 * Error types for a report run. An affiliation that cannot be resolved is
 * classified non-commercial and never raises.
 */

/**
 * Malformed query, unsafe output path, or out-of-range option.
 * Raised before any request is made; nothing is written.
 */
export class InputValidationError extends Error {
    constructor(
        message: string,
        public readonly field: 'query' | 'file' | 'maxResults' | 'batchSize' | 'requestsPerSecond' | 'timeoutMs'
    ) {
        super(message);
        this.name = 'InputValidationError';
    }
}

export type RemoteOperation = 'search' | 'fetch';

/**
 * Identifies the batch a failed fetch belonged to.
 */
export interface BatchContext {
    /** 1-based batch number */
    index: number;
    total: number;
    ids: readonly string[];
}

/**
 * Network failure, non-success status, or error payload from the literature database.
 */
export class RemoteApiError extends Error {
    public readonly operation: RemoteOperation;
    public readonly query?: string;
    public readonly batch?: BatchContext;
    public readonly status?: number;

    constructor(
        message: string,
        details: {
            operation: RemoteOperation;
            query?: string;
            batch?: BatchContext;
            status?: number;
            cause?: unknown;
        }
    ) {
        super(message, { cause: details.cause });
        this.name = 'RemoteApiError';
        this.operation = details.operation;
        this.query = details.query;
        this.batch = details.batch;
        this.status = details.status;
    }
}

/**
 * Company reference file missing, unreadable, or not of the expected shape.
 */
export class ReferenceDataError extends Error {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ReferenceDataError';
    }
}

/**
 * Exit code for a failed run.
 */
export function exitCodeFor(error: unknown): number {
    return error instanceof InputValidationError ? 2 : 1;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
