import express, { Express, Router } from "express";
import { AuditPipeline } from "../../../libs/bootstrap/auditPipeline.js";
import { traceContextMiddleware } from "../../../libs/middleware/traceContext.js";
import { identityMiddleware, PrincipalResolver } from "../../../libs/middleware/identity.js";
import { auditedRoute } from "../../../libs/middleware/auditedRoute.js";
import { errorHandler } from "../../../libs/middleware/errorHandler.js";
import { OperationAuditDefault } from "../../../libs/audit/schema.js";

/**
 * Static audit defaults for the gateway's own operations.
 * Dynamic rules take precedence over these.
 */
export const GATEWAY_AUDIT_DEFAULTS: Readonly<Record<string, OperationAuditDefault>> = Object.freeze({
    'audit-config.read': { logRequest: false, logResponse: false, onlyOnError: true },
    'audit-config.refresh': { logRequest: false, logResponse: true, logError: true }
});

export interface GatewayOptions {
    resolvePrincipal?: PrincipalResolver;
    /** Business routes, mounted under /api and audited through the pipeline. */
    mountRoutes?: (router: Router, pipeline: Pick<AuditPipeline, 'interceptor'>) => void;
}

export function createApp(pipeline: Pick<AuditPipeline, 'config' | 'resolver' | 'sink' | 'interceptor'>, options: GatewayOptions = {}): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(traceContextMiddleware(pipeline.config.traceHeader));
    app.use(express.json({ limit: '1mb' }));
    app.use(identityMiddleware(options.resolvePrincipal));

    app.get('/health', (_req, res) => {
        res.json({ status: 'UP' });
    });

    app.get('/internal/audit-config', auditedRoute(pipeline.interceptor, () => {
        const { version, loadedAt, rules } = pipeline.resolver.snapshot();
        return {
            version,
            loadedAt: loadedAt.toISOString(),
            rules: rules.map(rule => ({ ...rule, maskFields: [...rule.maskFields] })),
            sink: pipeline.sink.stats()
        };
    }, { operation: 'audit-config.read' }));

    app.post('/internal/audit-config/refresh', auditedRoute(pipeline.interceptor, async () => {
        const refreshed = await pipeline.resolver.refresh();
        return { refreshed, version: pipeline.resolver.snapshot().version };
    }, { operation: 'audit-config.refresh' }));

    if (options.mountRoutes) {
        const router = Router();
        options.mountRoutes(router, pipeline);
        app.use('/api', router);
    }

    app.use(errorHandler);

    return app;
}
