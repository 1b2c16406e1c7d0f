import { AuthenticationError, AuthorizationError, ValidationError, type ValidationIssue } from './appErrors.js';
import { ErrorSanitizer } from './sanitizer.js';
import { FAILURE_KIND_METADATA, NameExhaustedError, RegistryError } from './taxonomy.js';

/**
 * Public error body shape.
 */
export interface ErrorBody {
    readonly error: {
        readonly code: string;
        readonly message: string;
        readonly retryable?: boolean;
        readonly incidentId?: string;
        readonly issues?: readonly ValidationIssue[];
    };
}

export interface ErrorResponse {
    readonly status: number;
    readonly body: ErrorBody;
}

// Raised by express.json() for unparseable or oversized bodies.
function bodyParserFailure(err: unknown): { status: number; message: string } | undefined {
    if (!(err instanceof Error) || !('type' in err)) return undefined;
    if (err.type === 'entity.parse.failed') return { status: 400, message: 'Request body is not valid JSON' };
    if (err.type === 'entity.too.large') return { status: 413, message: 'Request body is too large' };
    return undefined;
}

/**
 * Maps any thrown value to an HTTP status and public body.
 * Unknown failures are sanitized: the caller sees only an incident id.
 */
export function toErrorResponse(err: unknown, contextLabel: string): ErrorResponse {
    if (err instanceof ValidationError) {
        return { status: err.statusCode, body: { error: { code: err.code, message: err.message, issues: err.issues } } };
    }

    if (err instanceof AuthenticationError || err instanceof AuthorizationError) {
        return { status: err.statusCode, body: { error: { code: err.code, message: err.message } } };
    }

    if (err instanceof NameExhaustedError) {
        return {
            status: FAILURE_KIND_METADATA.NAME_EXHAUSTED.httpStatus,
            body: { error: { code: err.kind, message: err.message, retryable: err.retryable } }
        };
    }

    if (err instanceof RegistryError) {
        const metadata = FAILURE_KIND_METADATA[err.kind];

        if (err.kind === 'UNKNOWN') {
            const sanitized = ErrorSanitizer.sanitize(err, contextLabel);
            return {
                status: metadata.httpStatus,
                body: {
                    error: {
                        code: err.kind,
                        message: sanitized.publicMessage,
                        retryable: metadata.retryable,
                        incidentId: sanitized.incidentId
                    }
                }
            };
        }

        return {
            status: metadata.httpStatus,
            body: { error: { code: err.kind, message: err.message, retryable: metadata.retryable } }
        };
    }

    const parseFailure = bodyParserFailure(err);
    if (parseFailure) {
        return { status: parseFailure.status, body: { error: { code: 'MALFORMED_REQUEST', message: parseFailure.message } } };
    }

    const sanitized = ErrorSanitizer.sanitize(err, contextLabel);
    return {
        status: 500,
        body: { error: { code: 'INTERNAL_ERROR', message: sanitized.publicMessage, incidentId: sanitized.incidentId } }
    };
}
