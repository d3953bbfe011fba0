import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ServiceError, statusCodeOf } from '../errors/sanitizer.js';
import { RequestContext } from '../context/requestContext.js';
import { getContextLogger, logger } from '../logging/logger.js';

/**
 * Terminal error handler. Renders the status carried by the error (500
 * otherwise) and never exposes internal messages for server errors.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        next(err);
        return;
    }

    const status = statusCodeOf(err) ?? 500;
    if (status >= 500) {
        const context = RequestContext.get();
        const log = context ? getContextLogger(context) : logger;
        log.error({ error: err, method: req.method, path: req.path }, 'Unhandled request error');
    }

    const body: { error: string; incidentId?: string } = {
        error: status < 500 && err instanceof Error ? err.message : 'Internal Server Error'
    };
    if (err instanceof ServiceError) {
        body.incidentId = err.incidentId;
    }

    res.status(status).json(body);
};
