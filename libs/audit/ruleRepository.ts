/**
 * Audit Rule Repository
 *
 * PostgreSQL rule source for the config resolver.
 * Reads every enabled row of user_event_audit_config in id order. Rows that
 * fail validation are skipped and reported; they never abort a refresh.
 */

import { z } from 'zod';
import { db } from '../db/index.js';
import { logger } from '../logging/logger.js';
import { RuleSource } from './configResolver.js';
import { AuditRule, MatchType, parseMaskFields } from './schema.js';

const log = logger.child({ component: 'AuditRuleRepository' });

// Rows stored before GLOB was introduced carry ANT.
const STORED_MATCH_TYPES: Record<string, MatchType> = {
    EXACT: 'EXACT',
    ANT: 'GLOB',
    GLOB: 'GLOB',
    REGEX: 'REGEX'
};

export const AuditRuleRowSchema = z.object({
    id: z.union([z.string(), z.number()]),
    enabled: z.boolean(),
    http_method: z.string().trim().min(1).max(10),
    match_type: z.string().trim().transform((value, ctx) => {
        const matchType = STORED_MATCH_TYPES[value.toUpperCase()];
        if (!matchType) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown match type "${value}"` });
            return z.NEVER;
        }
        return matchType;
    }),
    path_pattern: z.string().min(1).max(255),
    log_request: z.boolean(),
    log_response: z.boolean(),
    log_error: z.boolean(),
    only_on_error: z.boolean(),
    mask_fields: z.string().nullable()
});

export type AuditRuleRow = z.input<typeof AuditRuleRowSchema>;

type RowReader = {
    query(text: string): Promise<{ rows: unknown[] }>;
};

function ruleIdOf(row: unknown): string | number | null {
    if (typeof row !== 'object' || row === null || !('id' in row)) return null;
    return typeof row.id === 'string' || typeof row.id === 'number' ? row.id : null;
}

function mapRowToRule(row: z.output<typeof AuditRuleRowSchema>): AuditRule {
    return Object.freeze({
        httpMethod: row.http_method.toUpperCase(),
        pathPattern: row.path_pattern,
        matchType: row.match_type,
        enabled: row.enabled,
        logRequest: row.log_request,
        logResponse: row.log_response,
        logError: row.log_error,
        onlyOnError: row.only_on_error,
        maskFields: parseMaskFields(row.mask_fields)
    });
}

export class AuditRuleRepository implements RuleSource {
    constructor(private readonly dbClient: RowReader = db) { }

    public async listEnabledRules(): Promise<AuditRule[]> {
        const result = await this.dbClient.query(
            `SELECT
                id,
                enabled,
                http_method,
                match_type,
                path_pattern,
                log_request,
                log_response,
                log_error,
                only_on_error,
                mask_fields
            FROM user_event_audit_config
            WHERE enabled = true
            ORDER BY id`
        );

        const rules: AuditRule[] = [];
        for (const row of result.rows) {
            const parsed = AuditRuleRowSchema.safeParse(row);
            if (!parsed.success) {
                log.warn({
                    ruleId: ruleIdOf(row),
                    errors: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
                }, 'Skipping invalid audit rule row');
                continue;
            }
            rules.push(mapRowToRule(parsed.data));
        }
        return rules;
    }
}
