/**
 * Principal identity as seen by the audit pipeline.
 * Authentication itself happens upstream; this layer only reads the outcome.
 */

export const ANONYMOUS_PRINCIPAL = 'anonymous';

export type PrincipalContext = Readonly<{
    name: string;
    roles: readonly string[];
    authenticated: boolean;
}>;

/**
 * Read-only view of the caller, consulted when an audit record is built.
 * Implementations return the "anonymous" sentinel when unauthenticated.
 */
export interface IdentityProvider {
    currentPrincipal(): string;
    currentRoles(): string[];
}
