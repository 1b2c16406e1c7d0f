import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Wraps internal errors in a generic message and an IncidentID that
 * correlates the public response with the full log record.
 */

export class ServiceError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'ServiceError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            contextLabel: this.contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized ServiceError.
     */
    sanitize: (err: unknown, contextLabel: string): ServiceError => {
        if (err instanceof ServiceError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let errorCode: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            if ('code' in err && typeof err.code === 'string') {
                errorCode = err.code;
            }
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
            if ('code' in err && typeof err.code === 'string') {
                errorCode = err.code;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new ServiceError(
            'An internal error occurred. Please contact support with the incident ID.',
            { originalError: originalErrorMessage, stack: originalErrorStack, code: errorCode, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};
