/**
 * Audit Config Resolver
 *
 * Holds an immutable snapshot of the enabled audit rules and resolves the
 * effective policy for a (method, path) pair:
 * - rules filtered by method (ANY or exact, case-insensitive)
 * - ranked EXACT > GLOB > REGEX, snapshot order within a tier
 * - first pattern match wins
 * - otherwise the static per-operation default, otherwise disabled
 *
 * A background refresh re-pulls the full rule list and swaps the snapshot
 * reference in one assignment. Readers never lock and never see a partial list.
 */

import { logger } from '../logging/logger.js';
import { AntPathPattern } from './pathMatcher.js';
import { OperationDefaults } from './operationDefaults.js';
import {
    ANY_METHOD,
    AuditRule,
    DISABLED_SETTINGS,
    EffectiveSettings,
    MatchType,
    OperationAuditDefault,
    settingsFromDefault,
    settingsFromRule
} from './schema.js';

const log = logger.child({ component: 'ConfigResolver' });

export const DEFAULT_REFRESH_INTERVAL_MS = 30 * 60 * 1000;

// setInterval clamps anything above a signed 32-bit delay to 1ms.
export const MAX_REFRESH_INTERVAL_MS = 2_147_483_647;

const TIER: Record<MatchType, number> = {
    EXACT: 0,
    GLOB: 1,
    REGEX: 2
};

/**
 * Pull-based rule source, invoked at startup and on each refresh tick.
 */
export interface RuleSource {
    listEnabledRules(): Promise<AuditRule[]>;
}

/**
 * Operation key into the static defaults, or an inline declaration.
 */
export type StaticFallback = string | OperationAuditDefault;

interface CompiledRule {
    readonly rule: AuditRule;
    readonly method: string;
    readonly matches: (path: string) => boolean;
}

export interface RuleSnapshot {
    readonly version: number;
    readonly loadedAt: Date;
    readonly rules: readonly AuditRule[];
}

interface InternalSnapshot extends RuleSnapshot {
    readonly compiled: readonly CompiledRule[];
}

function compileMatcher(rule: AuditRule): (path: string) => boolean {
    switch (rule.matchType) {
        case 'EXACT': {
            const expected = rule.pathPattern;
            return path => path === expected;
        }
        case 'GLOB': {
            const pattern = new AntPathPattern(rule.pathPattern);
            return path => pattern.matches(path);
        }
        case 'REGEX': {
            const regex = new RegExp(`^(?:${rule.pathPattern})$`);
            return path => regex.test(path);
        }
    }
}

/**
 * Builds a frozen, tier-sorted snapshot. Rules whose pattern cannot be
 * compiled are dropped and reported.
 */
function buildSnapshot(rules: readonly AuditRule[], version: number): InternalSnapshot {
    const compiled: Array<CompiledRule & { tier: number; order: number }> = [];

    rules.forEach((rule, order) => {
        if (!rule.enabled) return;
        try {
            compiled.push({
                rule,
                method: rule.httpMethod.toUpperCase(),
                matches: compileMatcher(rule),
                tier: TIER[rule.matchType],
                order
            });
        } catch (error) {
            log.warn(
                { error, pathPattern: rule.pathPattern, matchType: rule.matchType },
                'Audit rule skipped: pattern does not compile'
            );
        }
    });

    // Array#sort is stable, but order is compared explicitly to pin snapshot order.
    compiled.sort((a, b) => a.tier - b.tier || a.order - b.order);

    return Object.freeze({
        version,
        loadedAt: new Date(),
        rules: Object.freeze(compiled.map(entry => entry.rule)),
        compiled: Object.freeze(compiled.map(({ rule, method, matches }) => Object.freeze({ rule, method, matches })))
    });
}

export class ConfigResolver {
    private current: InternalSnapshot = buildSnapshot([], 0);
    private refreshInFlight: Promise<boolean> | null = null;
    private refreshTimer: NodeJS.Timeout | null = null;
    private startup: Promise<void> | null = null;
    private generation = 0;

    constructor(
        private readonly ruleSource: RuleSource,
        private readonly defaults: OperationDefaults = new OperationDefaults(),
        private readonly refreshIntervalMs: number = DEFAULT_REFRESH_INTERVAL_MS
    ) {
        if (!Number.isInteger(refreshIntervalMs) || refreshIntervalMs < 1 || refreshIntervalMs > MAX_REFRESH_INTERVAL_MS) {
            throw new Error(
                `Audit config refresh interval must be an integer between 1 and ${MAX_REFRESH_INTERVAL_MS} ms, got ${refreshIntervalMs}`
            );
        }
    }

    /**
     * Resolve the effective policy. Never throws on rule content and never
     * waits for a refresh.
     */
    public resolve(httpMethod: string, path: string, staticFallback?: StaticFallback): EffectiveSettings {
        const snapshot = this.current;
        const method = httpMethod.toUpperCase();

        for (const entry of snapshot.compiled) {
            if (entry.method !== ANY_METHOD && entry.method !== method) continue;
            if (entry.matches(path)) {
                return settingsFromRule(entry.rule);
            }
        }

        return this.resolveFallback(staticFallback);
    }

    public snapshot(): RuleSnapshot {
        const { version, loadedAt, rules } = this.current;
        return { version, loadedAt, rules };
    }

    /**
     * Re-pull the full rule list and swap the snapshot.
     * Resolves false when the source failed; the previous snapshot stays live.
     * Concurrent callers share the refresh already in flight.
     */
    public refresh(): Promise<boolean> {
        if (!this.refreshInFlight) {
            this.refreshInFlight = this.pullAndSwap().finally(() => {
                this.refreshInFlight = null;
            });
        }
        return this.refreshInFlight;
    }

    /**
     * Initial load plus periodic refresh. A second call while started shares
     * the first call's initial load and schedules nothing.
     */
    public start(): Promise<void> {
        if (this.startup) {
            log.warn('Config resolver already started');
            return this.startup;
        }
        this.generation += 1;
        this.startup = this.loadAndSchedule(this.generation);
        return this.startup;
    }

    public stop(): void {
        this.generation += 1;
        this.startup = null;
        if (this.refreshTimer) {
            clearInterval(this.refreshTimer);
            this.refreshTimer = null;
        }
    }

    private async loadAndSchedule(generation: number): Promise<void> {
        await this.refresh();

        // stop() ran during the initial load
        if (generation !== this.generation) return;

        this.refreshTimer = setInterval(() => {
            void this.refresh();
        }, this.refreshIntervalMs);
        this.refreshTimer.unref();

        log.info({ refreshIntervalMs: this.refreshIntervalMs }, 'Audit config refresh scheduled');
    }

    private resolveFallback(staticFallback: StaticFallback | undefined): EffectiveSettings {
        if (staticFallback === undefined) {
            return DISABLED_SETTINGS;
        }
        if (typeof staticFallback === 'string') {
            return this.defaults.lookup(staticFallback) ?? DISABLED_SETTINGS;
        }
        return settingsFromDefault(staticFallback);
    }

    private async pullAndSwap(): Promise<boolean> {
        let rules: AuditRule[];
        try {
            rules = await this.ruleSource.listEnabledRules();
        } catch (error) {
            log.error(
                { error, retainedVersion: this.current.version, retainedRules: this.current.rules.length },
                'Audit config refresh failed; keeping previous snapshot'
            );
            return false;
        }

        const next = buildSnapshot(rules, this.current.version + 1);
        this.current = next;

        log.info(
            { version: next.version, entries: next.rules.length },
            `Audit config cache refreshed. Next refresh in ~${Math.round(this.refreshIntervalMs / 60000)} minute(s)`
        );
        return true;
    }
}
