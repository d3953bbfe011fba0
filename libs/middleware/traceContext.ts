import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { TraceContext } from '../context/traceContext.js';

export const DEFAULT_TRACE_HEADER = 'x-trace-id';

/**
 * Request boundary for the correlation id.
 * Begins the trace scope from the inbound header (or a fresh UUID), echoes it
 * on the response, and clears it once the response finishes or the
 * connection closes, whichever comes first.
 */
export function traceContextMiddleware(headerName: string = DEFAULT_TRACE_HEADER): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        TraceContext.run(req.get(headerName), traceId => new Promise<void>(resolve => {
            res.setHeader(headerName, traceId);
            res.once('finish', () => resolve());
            res.once('close', () => resolve());
            next();
        })).catch(next);
    };
}
