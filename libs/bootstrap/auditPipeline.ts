import { logger } from "../logging/logger.js";
import { AuditConfig, loadAuditConfig } from "./config/audit-config.js";
import { ConfigResolver, RuleSource } from "../audit/configResolver.js";
import { OperationDefaults } from "../audit/operationDefaults.js";
import { AuditPersistence, AuditSink } from "../audit/auditSink.js";
import { AuditInterceptor } from "../audit/interceptor.js";
import { AuditRuleRepository } from "../audit/ruleRepository.js";
import { AuditRecordRepository } from "../audit/auditRepository.js";
import { OperationAuditDefault } from "../audit/schema.js";
import { IdentityProvider } from "../context/identity.js";
import { requestContextIdentity } from "../context/requestContext.js";

export interface AuditPipeline {
    config: AuditConfig;
    resolver: ConfigResolver;
    sink: AuditSink;
    interceptor: AuditInterceptor;
    /** Stops the refresh schedule and waits for queued records. */
    shutdown(): Promise<void>;
}

export interface AuditPipelineOptions {
    config?: AuditConfig;
    defaults?: Readonly<Record<string, OperationAuditDefault>>;
    ruleSource?: RuleSource;
    persistence?: AuditPersistence;
    identity?: IdentityProvider;
}

/**
 * Wires resolver, sink and interceptor and performs the initial rule load.
 * PostgreSQL collaborators are used unless others are supplied.
 */
export async function createAuditPipeline(options: AuditPipelineOptions = {}): Promise<AuditPipeline> {
    const config = options.config ?? loadAuditConfig();
    const defaults = new OperationDefaults(options.defaults);

    const resolver = new ConfigResolver(
        options.ruleSource ?? new AuditRuleRepository(),
        defaults,
        config.refreshIntervalMs
    );
    const sink = new AuditSink(options.persistence ?? new AuditRecordRepository(), config.workerPoolSize);
    const interceptor = new AuditInterceptor(resolver, sink, options.identity ?? requestContextIdentity);

    await resolver.start();

    logger.info({
        refreshIntervalMs: config.refreshIntervalMs,
        workerPoolSize: config.workerPoolSize,
        staticDefaults: defaults.size
    }, "Audit pipeline started");

    return {
        config,
        resolver,
        sink,
        interceptor,
        shutdown: async () => {
            resolver.stop();
            await sink.drain();
            logger.info(sink.stats(), "Audit pipeline stopped");
        }
    };
}
