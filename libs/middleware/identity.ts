import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RequestContext } from '../context/requestContext.js';
import { ANONYMOUS_PRINCIPAL, PrincipalContext } from '../context/identity.js';

/**
 * Maps an already-authenticated request to a principal.
 * Returning undefined marks the caller as anonymous.
 */
export type PrincipalResolver = (req: Request, res: Response) => PrincipalContext | undefined;

const ANONYMOUS: PrincipalContext = Object.freeze({
    name: ANONYMOUS_PRINCIPAL,
    roles: Object.freeze([]),
    authenticated: false
});

/**
 * Default resolver: reads res.locals.principal as left by the security layer.
 */
export const localsPrincipalResolver: PrincipalResolver = (_req, res) => {
    const candidate: unknown = res.locals.principal;
    if (!candidate || typeof candidate !== 'object') return undefined;

    const name: unknown = Reflect.get(candidate, 'name');
    const roles: unknown = Reflect.get(candidate, 'roles');
    if (typeof name !== 'string' || name.trim() === '') return undefined;

    return {
        name,
        roles: Array.isArray(roles) ? roles.filter((role): role is string => typeof role === 'string') : [],
        authenticated: true
    };
};

/**
 * Establishes the RequestContext scope for everything downstream.
 */
export function identityMiddleware(resolvePrincipal: PrincipalResolver = localsPrincipalResolver): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        let principal: PrincipalContext;
        try {
            principal = resolvePrincipal(req, res) ?? ANONYMOUS;
        } catch (error) {
            next(error);
            return;
        }
        RequestContext.run(principal, () => next());
    };
}
