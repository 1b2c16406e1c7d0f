/**
 * Errors raised at the service boundary (input, authentication, authorization).
 * Each carries a machine-readable code and the HTTP status it maps to.
 */

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends Error {
    readonly code = 'VALIDATION_FAILED';
    readonly statusCode = 400;

    constructor(message: string, public readonly issues: readonly ValidationIssue[] = []) {
        super(message);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export class AuthenticationError extends Error {
    readonly code = 'AUTHENTICATION_FAILED';
    readonly statusCode = 401;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'AuthenticationError';
        Object.setPrototypeOf(this, AuthenticationError.prototype);
    }
}

export class AuthorizationError extends Error {
    readonly code = 'ACCESS_DENIED';
    readonly statusCode = 403;

    constructor(message: string) {
        super(message);
        this.name = 'AuthorizationError';
        Object.setPrototypeOf(this, AuthorizationError.prototype);
    }
}
