import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Sanitizes internal errors by wrapping them in a generic message
 * and providing a unique IncidentID for log correlation.
 */

export class ServiceError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'ServiceError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStringField(value: object, field: string): string | undefined {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized ServiceError.
     */
    sanitize: (err: unknown, contextLabel: string): ServiceError => {
        if (err instanceof ServiceError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            sqlState = readStringField(err, 'code');
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object') {
            originalErrorMessage = readStringField(err, 'message') ?? String(err);
            originalErrorStack = readStringField(err, 'stack');
            sqlState = readStringField(err, 'code');
        } else {
            originalErrorMessage = String(err);
        }

        // Hide raw driver/stack details behind the context label
        return new ServiceError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, sqlState }
        );
    }
};

/**
 * One-line summary of a thrown value, as stored in an audit record.
 */
export function summarizeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message ? `${err.name}: ${err.message}` : err.name;
    }
    if (typeof err === 'string') return err;
    try {
        return String(err);
    } catch {
        return 'Unknown error';
    }
}

/**
 * HTTP status carried by a thrown value, if any.
 */
export function statusCodeOf(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined;
    for (const field of ['statusCode', 'status']) {
        const candidate: unknown = Reflect.get(err, field);
        if (typeof candidate === 'number' && Number.isInteger(candidate) && candidate >= 100 && candidate <= 599) {
            return candidate;
        }
    }
    return undefined;
}
