import type { CallerIdentity } from "../context/identity.js";
import { AuthorizationError } from "../errors/appErrors.js";
import { getContextLogger } from "../logging/logger.js";

/**
 * Authorization decisions for credential operations.
 *
 * A caller may act for principal P when P is the caller itself, or when
 * the caller is an administrator (admin role or admin permission).
 */

export function canActFor(caller: CallerIdentity, principal: string): boolean {
    return caller.isAdmin || caller.principal === principal;
}

/**
 * Picks the principal a request acts on: the caller by default, or the
 * requested one when the caller is allowed to act for it.
 */
export function resolveTargetPrincipal(caller: CallerIdentity, requested?: string): string {
    const target = requested ?? caller.principal;

    if (!canActFor(caller, target)) {
        getContextLogger().warn({ caller: caller.principal, target }, "AUTHZ_DENY: cross-principal access");
        throw new AuthorizationError(`Caller '${caller.principal}' may not manage credentials of '${target}'`);
    }

    return target;
}

export function requireAdmin(caller: CallerIdentity): void {
    if (!caller.isAdmin) {
        getContextLogger().warn({ caller: caller.principal }, "AUTHZ_DENY: admin required");
        throw new AuthorizationError("Administrative privileges required");
    }
}
