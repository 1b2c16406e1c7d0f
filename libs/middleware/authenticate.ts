import type { Request, Response, NextFunction } from 'express';
import { RequestContext } from '../context/requestContext.js';
import type { CallerIdentity } from '../context/identity.js';
import { AuthenticationError } from '../errors/appErrors.js';
import { extractBearerToken } from '../auth/callerAuth.js';

export interface CallerVerifier {
    authenticate(token: string): Promise<CallerIdentity>;
}

/**
 * Verifies the bearer token and extends the request scope with the caller.
 * Fail-closed: no caller, no downstream handler.
 */
export function authenticateCaller(verifier: CallerVerifier) {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
        let caller: CallerIdentity;
        try {
            caller = await verifier.authenticate(extractBearerToken(req.headers.authorization));
        } catch (error) {
            next(error);
            return;
        }

        RequestContext.extend({ caller }, () => next());
    };
}

/**
 * Caller of the current request.
 */
export function currentCaller(): CallerIdentity {
    const caller = RequestContext.get().caller;
    if (!caller) {
        throw new AuthenticationError('Request is not authenticated');
    }
    return caller;
}
