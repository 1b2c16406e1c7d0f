/**
 * Caller identity established by bearer-token verification.
 *
 * `principal` is the application-level user the caller authenticated as;
 * it is also the registry consumer username for self-service requests.
 */
export interface CallerIdentity {
    readonly principal: string;
    readonly subject: string;
    readonly issuer: string;
    readonly roles: readonly string[];
    readonly permissions: readonly string[];
    readonly isAdmin: boolean;
}

/**
 * Request-scoped data carried through AsyncLocalStorage.
 * `caller` is absent until authentication succeeds; `principal` is the
 * target the request acts on (the caller itself or, for admins, another user).
 */
export interface RequestScope {
    readonly requestId: string;
    readonly caller?: CallerIdentity;
    readonly principal?: string;
}
