import { z } from 'zod';
import { defaultWorkerPoolSize } from '../../audit/auditSink.js';
import { DEFAULT_REFRESH_INTERVAL_MS, MAX_REFRESH_INTERVAL_MS } from '../../audit/configResolver.js';
import { validate } from '../../validation/zod-middleware.js';

/**
 * Audit pipeline knobs, read from the environment.
 *
 *   AUDIT_CONFIG_REFRESH_INTERVAL  rule refresh period: 30m, 45s, 2h, 1d, 500ms,
 *                                  plain milliseconds, or ISO-8601 (PT5M); at most 24d
 *   AUDIT_WORKER_POOL_SIZE         persistence workers (default: hardware parallelism)
 *   AUDIT_TRACE_HEADER             inbound/outbound correlation header
 */

const UNIT_MS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
    d: 24 * 60 * 60 * 1000
};

const SIMPLE_DURATION = /^(\d+)\s*(ms|s|m|h|d)?$/i;
const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;

/**
 * Parses a duration into milliseconds; undefined when unrecognized.
 */
export function parseDuration(value: string): number | undefined {
    const trimmed = value.trim();

    const simple = SIMPLE_DURATION.exec(trimmed);
    if (simple) {
        const unit = (simple[2] ?? 'ms').toLowerCase();
        return Number(simple[1]) * (UNIT_MS[unit] ?? 1);
    }

    const iso = ISO_DURATION.exec(trimmed);
    if (iso && /\d/.test(trimmed) && !trimmed.toUpperCase().endsWith('T')) {
        const [, days, hours, minutes, seconds] = iso;
        return Math.round(
            Number(days ?? 0) * UNIT_MS.d +
            Number(hours ?? 0) * UNIT_MS.h +
            Number(minutes ?? 0) * UNIT_MS.m +
            Number(seconds ?? 0) * UNIT_MS.s
        );
    }

    return undefined;
}

const durationSchema = z.string().transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === undefined || ms <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
        return z.NEVER;
    }
    if (ms > MAX_REFRESH_INTERVAL_MS) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duration "${value}" exceeds ${MAX_REFRESH_INTERVAL_MS} ms` });
        return z.NEVER;
    }
    return ms;
});

export const AuditConfigSchema = z.object({
    refreshIntervalMs: durationSchema.optional().transform(ms => ms ?? DEFAULT_REFRESH_INTERVAL_MS),
    workerPoolSize: z.coerce.number().int().positive().optional().transform(size => size ?? defaultWorkerPoolSize()),
    traceHeader: z.string().min(1).optional().transform(header => (header ?? 'x-trace-id').toLowerCase())
});

export type AuditConfig = z.output<typeof AuditConfigSchema>;

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

export function loadAuditConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
    return validate(AuditConfigSchema, {
        refreshIntervalMs: envValue(env, 'AUDIT_CONFIG_REFRESH_INTERVAL'),
        workerPoolSize: envValue(env, 'AUDIT_WORKER_POOL_SIZE'),
        traceHeader: envValue(env, 'AUDIT_TRACE_HEADER')
    }, 'AuditConfig');
}
