import type { ErrorRequestHandler, Request, Response } from 'express';
import { getContextLogger } from '../logging/logger.js';
import { toErrorResponse } from '../errors/responses.js';

/**
 * Terminal error middleware. Every failure leaves through here.
 */
export function errorHandler(contextLabel: string): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
        const { status, body } = toErrorResponse(err, `${contextLabel}:${req.method} ${req.path}`);
        const log = getContextLogger();

        if (status >= 500) {
            log.error({ status, code: body.error.code, incidentId: body.error.incidentId }, 'Request failed');
        } else {
            log.warn({ status, code: body.error.code }, 'Request rejected');
        }

        if (res.headersSent) {
            next(err);
            return;
        }

        res.status(status).json(body);
    };
}

export function notFoundHandler() {
    return (_req: Request, res: Response): void => {
        res.status(404).json({ error: { code: 'ROUTE_NOT_FOUND', message: 'No such route' } });
    };
}
