/**
 * Audit Interceptor
 *
 * Around-hook composed over a business operation at registration time.
 * Per call: resolve policy -> capture request? -> execute -> capture result?
 * -> suppress or emit. The operation's result or error reaches the caller
 * unchanged; nothing on the audit path can alter it.
 */

import crypto from 'node:crypto';
import { logger } from '../logging/logger.js';
import { TraceContext } from '../context/traceContext.js';
import { IdentityProvider } from '../context/identity.js';
import { requestContextIdentity } from '../context/requestContext.js';
import { statusCodeOf, summarizeError } from '../errors/sanitizer.js';
import { ConfigResolver, StaticFallback } from './configResolver.js';
import { PayloadMasker } from './payloadMasker.js';
import { AuditSink } from './auditSink.js';
import { AuditRecord, DISABLED_SETTINGS, EffectiveSettings } from './schema.js';

const log = logger.child({ component: 'AuditInterceptor' });

export interface OperationMetadata {
    method: string;
    path: string;
    clientAddress?: string | null;
    /** Static default key (or inline default) used when no rule matches. */
    operation?: StaticFallback;
    /** Captured as the request body when logRequest is set. */
    args?: unknown;
    /** Live response status, read after a successful operation. */
    statusCode?: () => number;
}

export type Operation<T> = () => Promise<T> | T;

type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: unknown };

export class AuditInterceptor {
    constructor(
        private readonly resolver: ConfigResolver,
        private readonly sink: Pick<AuditSink, 'submit'>,
        private readonly identity: IdentityProvider = requestContextIdentity
    ) { }

    /**
     * Invoke op under the effective audit policy for metadata.
     */
    public async around<T>(metadata: OperationMetadata, op: Operation<T>): Promise<T> {
        const settings = this.resolveSafely(metadata);
        if (!settings.enabled) {
            return op();
        }

        const startedAt = new Date();
        const requestBody = settings.logRequest
            ? PayloadMasker.mask(metadata.args, settings.maskFields)
            : undefined;

        const started = process.hrtime.bigint();
        let outcome: Outcome<T>;
        try {
            outcome = { ok: true, value: await op() };
        } catch (error) {
            outcome = { ok: false, error };
        }
        const durationMs = Number((process.hrtime.bigint() - started) / 1_000_000n);

        this.emit(metadata, settings, outcome, { startedAt, durationMs, requestBody });

        if (!outcome.ok) {
            throw outcome.error;
        }
        return outcome.value;
    }

    /**
     * Compose the hook around op once; metadata is derived per invocation.
     */
    public wrap<A extends unknown[], T>(
        describe: (...args: A) => OperationMetadata,
        op: (...args: A) => Promise<T> | T
    ): (...args: A) => Promise<T> {
        return (...args: A) => this.around(describe(...args), () => op(...args));
    }

    private resolveSafely(metadata: OperationMetadata): EffectiveSettings {
        try {
            return this.resolver.resolve(metadata.method, metadata.path, metadata.operation);
        } catch (error) {
            log.error({ error, method: metadata.method, path: metadata.path }, 'Audit policy resolution failed; auditing skipped');
            return DISABLED_SETTINGS;
        }
    }

    private emit<T>(
        metadata: OperationMetadata,
        settings: EffectiveSettings,
        outcome: Outcome<T>,
        timing: { startedAt: Date; durationMs: number; requestBody: string | undefined }
    ): void {
        if (outcome.ok && settings.onlyOnError) return;
        if (!outcome.ok && !settings.logError) return;

        try {
            const responseBody = outcome.ok && settings.logResponse
                ? PayloadMasker.mask(outcome.value, settings.maskFields)
                : undefined;

            const record: AuditRecord = Object.freeze({
                traceId: TraceContext.current() ?? crypto.randomUUID(),
                principal: this.identity.currentPrincipal(),
                roles: Object.freeze(this.identity.currentRoles()),
                httpMethod: metadata.method,
                path: metadata.path,
                ...(timing.requestBody !== undefined ? { requestBody: timing.requestBody } : {}),
                ...(responseBody !== undefined ? { responseBody } : {}),
                ...(outcome.ok ? {} : { error: summarizeError(outcome.error) }),
                startedAt: timing.startedAt,
                durationMs: timing.durationMs,
                statusCode: this.statusFor(metadata, outcome),
                clientAddress: metadata.clientAddress ?? null
            });

            this.sink.submit(record);
        } catch (error) {
            log.error({ error, method: metadata.method, path: metadata.path }, 'Audit record emission failed');
        }
    }

    private statusFor<T>(metadata: OperationMetadata, outcome: Outcome<T>): number {
        if (!outcome.ok) {
            return statusCodeOf(outcome.error) ?? 500;
        }
        return metadata.statusCode ? metadata.statusCode() : 200;
    }
}
