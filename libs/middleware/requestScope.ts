import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { RequestContext } from '../context/requestContext.js';

// Propagated ids are echoed into logs and headers; anything else is replaced.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Opens a request scope for everything downstream, carrying the caller's
 * x-request-id or a generated one.
 */
export function requestScope() {
    return (req: Request, res: Response, next: NextFunction): void => {
        const header = req.headers[REQUEST_ID_HEADER];
        const requestId = typeof header === 'string' && REQUEST_ID_PATTERN.test(header)
            ? header
            : crypto.randomUUID();

        res.setHeader(REQUEST_ID_HEADER, requestId);
        RequestContext.run({ requestId }, () => next());
    };
}
