import { AsyncLocalStorage } from 'node:async_hooks';
import { ANONYMOUS_PRINCIPAL, IdentityProvider, PrincipalContext } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * CRITICAL: Only the request boundary (identity middleware) should call run().
 * All downstream code should only call get().
 */

const storage = new AsyncLocalStorage<PrincipalContext>();

export class RequestContext {
    /**
     * Establish the principal scope for a request lifecycle.
     * Supports both sync and async functions.
     */
    public static run<T>(
        context: PrincipalContext,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...context, roles: Object.freeze([...context.roles]) }), fn);
    }

    /**
     * Current principal, or undefined outside a run() scope.
     */
    public static get(): PrincipalContext | undefined {
        return storage.getStore();
    }
}

/**
 * Identity provider backed by RequestContext.
 * Unauthenticated callers (or calls outside any scope) map to "anonymous".
 */
export class RequestContextIdentityProvider implements IdentityProvider {
    currentPrincipal(): string {
        const ctx = RequestContext.get();
        if (!ctx || !ctx.authenticated) return ANONYMOUS_PRINCIPAL;
        return ctx.name;
    }

    currentRoles(): string[] {
        const ctx = RequestContext.get();
        if (!ctx || !ctx.authenticated) return [ANONYMOUS_PRINCIPAL];
        return [...ctx.roles];
    }
}

export const requestContextIdentity: IdentityProvider = new RequestContextIdentityProvider();
