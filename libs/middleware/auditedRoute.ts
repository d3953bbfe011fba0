import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuditInterceptor } from '../audit/interceptor.js';
import { StaticFallback } from '../audit/configResolver.js';

export interface AuditedRouteOptions {
    /** Static default key (or inline default) for this route. */
    operation?: StaticFallback;
    /** What to record as the request payload. Defaults to the parsed body. */
    capture?: (req: Request) => unknown;
}

export type RouteHandler<T> = (req: Request, res: Response) => Promise<T> | T;

/**
 * Path without query string, relative to the application root.
 */
export function requestPath(req: Request): string {
    const url = req.originalUrl || req.url;
    const queryIdx = url.indexOf('?');
    return queryIdx === -1 ? url : url.slice(0, queryIdx);
}

/**
 * Binds a route handler to the audit interceptor at registration time.
 * The handler's return value is sent as JSON unless it already responded;
 * its error goes to the express error chain untouched.
 */
export function auditedRoute<T>(
    interceptor: AuditInterceptor,
    handler: RouteHandler<T>,
    options: AuditedRouteOptions = {}
): RequestHandler {
    const capture = options.capture ?? ((req: Request) => req.body);

    return (req: Request, res: Response, next: NextFunction) => {
        interceptor.around({
            method: req.method,
            path: requestPath(req),
            clientAddress: req.ip ?? req.socket.remoteAddress ?? null,
            operation: options.operation,
            args: capture(req),
            statusCode: () => res.statusCode
        }, async () => {
            const result = await handler(req, res);
            // Set before the interceptor reads the status for the record.
            if (result === undefined && !res.headersSent) {
                res.status(204);
            }
            return result;
        })
            .then(result => {
                if (res.headersSent) return;
                if (result === undefined) {
                    res.end();
                } else {
                    res.json(result);
                }
            })
            .catch(next);
    };
}
