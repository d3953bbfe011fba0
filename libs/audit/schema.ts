/**
 * Request Audit Schema
 *
 * AuditRule       - declarative policy entry, loaded in bulk from the rule source
 * EffectiveSettings - per-call policy after precedence and fallback
 * AuditRecord     - one completed, masked call handed to the sink
 */

export const MATCH_TYPES = ['EXACT', 'GLOB', 'REGEX'] as const;

export type MatchType = typeof MATCH_TYPES[number];

export const ANY_METHOD = 'ANY';

export interface AuditRule {
    readonly httpMethod: string;      // 'ANY' or an exact method
    readonly pathPattern: string;
    readonly matchType: MatchType;
    readonly enabled: boolean;
    readonly logRequest: boolean;
    readonly logResponse: boolean;
    readonly logError: boolean;
    readonly onlyOnError: boolean;
    readonly maskFields: ReadonlySet<string>;
}

export type SettingsSource = 'rule' | 'default' | 'none';

export interface EffectiveSettings {
    readonly enabled: boolean;
    readonly logRequest: boolean;
    readonly logResponse: boolean;
    readonly logError: boolean;
    readonly onlyOnError: boolean;
    readonly maskFields: ReadonlySet<string>;
    readonly source: SettingsSource;
}

/**
 * Statically declared per-operation policy, used when no dynamic rule matches.
 * Omitted flags take the same defaults the declaration marker always had.
 */
export interface OperationAuditDefault {
    logRequest?: boolean;
    logResponse?: boolean;
    logError?: boolean;
    onlyOnError?: boolean;
    maskFields?: Iterable<string>;
}

export interface AuditRecord {
    readonly traceId: string;          // UUID
    readonly principal: string;
    readonly roles: readonly string[];
    readonly httpMethod: string | null;
    readonly path: string | null;
    readonly requestBody?: string;     // masked
    readonly responseBody?: string;    // masked
    readonly error?: string;
    readonly startedAt: Date;
    readonly durationMs: number;
    readonly statusCode: number;
    readonly clientAddress: string | null;
}

export const DISABLED_SETTINGS: EffectiveSettings = Object.freeze({
    enabled: false,
    logRequest: false,
    logResponse: false,
    logError: false,
    onlyOnError: false,
    maskFields: new Set<string>(),
    source: 'none'
});

export function settingsFromRule(rule: AuditRule): EffectiveSettings {
    return Object.freeze({
        enabled: true,
        logRequest: rule.logRequest,
        logResponse: rule.logResponse,
        logError: rule.logError,
        onlyOnError: rule.onlyOnError,
        maskFields: rule.maskFields,
        source: 'rule'
    });
}

export function settingsFromDefault(declared: OperationAuditDefault): EffectiveSettings {
    return Object.freeze({
        enabled: true,
        logRequest: declared.logRequest ?? true,
        logResponse: declared.logResponse ?? true,
        logError: declared.logError ?? true,
        onlyOnError: declared.onlyOnError ?? false,
        maskFields: new Set(declared.maskFields ?? []),
        source: 'default'
    });
}

/**
 * Splits a comma-separated mask list, trimming and dropping empty entries.
 */
export function parseMaskFields(raw: string | null | undefined): ReadonlySet<string> {
    if (!raw || raw.trim() === '') return new Set();
    return new Set(
        raw.split(',')
            .map(field => field.trim())
            .filter(field => field.length > 0)
    );
}
