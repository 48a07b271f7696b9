/**
 * Error taxonomy for Spendwise.
 *
 * Each error carries a stable `code` so the shell can map it to a fixed
 * user-facing message without exposing internal error text.
 */

export type SpendwiseErrorCode =
    | 'AMOUNT_NOT_FOUND'
    | 'EXTERNAL_SERVICE_UNAVAILABLE'
    | 'STORAGE_ERROR'
    | 'TRANSPORT_ERROR';

export class SpendwiseError extends Error {
    readonly code: SpendwiseErrorCode;

    constructor(code: SpendwiseErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * No positive amount could be resolved for an expense.
 */
export class AmountNotFoundError extends SpendwiseError {
    constructor(message = 'No expense amount found', options?: { cause?: unknown }) {
        super('AMOUNT_NOT_FOUND', message, options);
    }
}

/**
 * An inference service is missing, failed, or timed out.
 * Recovered locally by skipping the classification tier.
 */
export class ExternalServiceError extends SpendwiseError {
    readonly service: string;

    constructor(service: string, message: string, options?: { cause?: unknown }) {
        super('EXTERNAL_SERVICE_UNAVAILABLE', `${service}: ${message}`, options);
        this.service = service;
    }
}

/**
 * Persistence failed on insert or scan. No partial state is left behind.
 */
export class StorageError extends SpendwiseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORAGE_ERROR', message, options);
    }
}

/**
 * An outbound message could not be delivered.
 */
export class TransportError extends SpendwiseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TRANSPORT_ERROR', message, options);
    }
}

/**
 * Message text of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
