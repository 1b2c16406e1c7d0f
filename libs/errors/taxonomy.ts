/**
 * Credential Failure Taxonomy
 *
 * Every registry round trip resolves to success or to exactly one
 * RegistryFailureKind. Upper layers branch on these kinds only, never on
 * raw transport detail.
 */

/**
 * Registry outcome classes.
 */
export type RegistryFailureKind =
    | 'CONFLICT'     // Registry-reported duplicate (username or credential key)
    | 'NOT_FOUND'    // Addressed consumer or credential does not exist
    | 'UNAVAILABLE'  // Connection refused / reset, DNS failure
    | 'TIMEOUT'      // Client-side deadline exceeded, outcome unknown
    | 'UNKNOWN';     // Anything else, raw status attached

/**
 * Kinds surfaced by the lifecycle operations.
 * NAME_EXHAUSTED is produced locally when every candidate name conflicts.
 */
export type CredentialErrorKind = RegistryFailureKind | 'NAME_EXHAUSTED';

/**
 * Per-kind handling metadata.
 */
export interface FailureKindMetadata {
    /** Whether a surrounding policy may retry the whole operation */
    readonly retryable: boolean;
    /** Status used when the failure crosses the HTTP boundary */
    readonly httpStatus: number;
    /** Human-readable reason */
    readonly reason: string;
}

/**
 * TIMEOUT Clarification:
 * a timed-out create may still have been applied by the registry. Callers
 * retrying an issuance can observe a CONFLICT for their own earlier name.
 */
export const TIMEOUT_CLARIFICATION =
    'TIMEOUT means the registry outcome is unknown; the write may or may not have been applied.';

export const FAILURE_KIND_METADATA: Record<CredentialErrorKind, FailureKindMetadata> = {
    CONFLICT: {
        retryable: false,
        httpStatus: 409,
        reason: 'Registry reported a uniqueness violation'
    },
    NOT_FOUND: {
        retryable: false,
        httpStatus: 404,
        reason: 'Registry has no such consumer or credential'
    },
    UNAVAILABLE: {
        retryable: true,
        httpStatus: 503,
        reason: 'Registry could not be reached; nothing was delivered'
    },
    TIMEOUT: {
        retryable: true,
        httpStatus: 504,
        reason: TIMEOUT_CLARIFICATION
    },
    UNKNOWN: {
        retryable: false,
        httpStatus: 502,
        reason: 'Registry returned an unexpected response'
    },
    NAME_EXHAUSTED: {
        retryable: false,
        httpStatus: 409,
        reason: 'Every candidate credential name collided with an existing credential'
    }
};

/**
 * Registry operations, used as diagnostic labels.
 */
export type RegistryOperation =
    | 'createConsumer'
    | 'getConsumer'
    | 'deleteConsumer'
    | 'listConsumers'
    | 'createCredential'
    | 'listCredentials'
    | 'deleteCredential';

/**
 * A classified registry failure.
 */
export class RegistryError extends Error {
    readonly kind: RegistryFailureKind;
    readonly operation: RegistryOperation;
    /** HTTP status when the registry answered at all */
    readonly status?: number;
    /** Truncated, secret-scrubbed response body or transport message */
    readonly detail?: string;

    constructor(
        kind: RegistryFailureKind,
        operation: RegistryOperation,
        message: string,
        options?: { status?: number; detail?: string; cause?: unknown }
    ) {
        super(message, { cause: options?.cause });
        this.name = 'RegistryError';
        this.kind = kind;
        this.operation = operation;
        this.status = options?.status;
        this.detail = options?.detail;
        Object.setPrototypeOf(this, RegistryError.prototype);
    }

    get retryable(): boolean {
        return FAILURE_KIND_METADATA[this.kind].retryable;
    }
}

/**
 * Raised after the bounded rename protocol runs out of attempts.
 */
export class NameExhaustedError extends Error {
    readonly kind = 'NAME_EXHAUSTED' as const;
    readonly retryable = false;

    constructor(
        public readonly requestedName: string,
        public readonly attempts: number,
        public readonly candidates: readonly string[]
    ) {
        super(`Could not create a credential for '${requestedName}' after ${attempts} conflicting attempts`);
        this.name = 'NameExhaustedError';
        Object.setPrototypeOf(this, NameExhaustedError.prototype);
    }
}

export function isRegistryError(err: unknown, kind?: RegistryFailureKind): err is RegistryError {
    return err instanceof RegistryError && (kind === undefined || err.kind === kind);
}
