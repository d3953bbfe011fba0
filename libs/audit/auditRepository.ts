/**
 * Audit Record Repository
 *
 * PostgreSQL persistence for completed audit records. The log row and its
 * payload row are written in one transaction; either both land or neither.
 */

import { z } from 'zod';
import { db } from '../db/index.js';
import { AuditPersistence } from './auditSink.js';
import { AuditRecord } from './schema.js';

type StatementRunner = {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
};

type TransactionRunner = {
    transaction<T>(callback: (tx: StatementRunner) => Promise<T>): Promise<T>;
};

const InsertedLogRowSchema = z.object({
    id: z.union([z.string(), z.number()])
});

/**
 * Roles as stored: comma-joined, "none" when the principal carries none.
 */
export function formatRoles(roles: readonly string[]): string {
    return roles.length > 0 ? roles.join(',') : 'none';
}

/**
 * Bodies go to jsonb columns. A masked body is JSON already; a diagnostic
 * placeholder is not, and is stored as a JSON string instead.
 */
export function toJsonbParam(body: string | undefined): string | null {
    if (body === undefined) return null;
    try {
        JSON.parse(body);
        return body;
    } catch {
        return JSON.stringify(body);
    }
}

export class AuditRecordRepository implements AuditPersistence {
    constructor(private readonly dbClient: TransactionRunner = db) { }

    public async store(record: AuditRecord): Promise<void> {
        await this.dbClient.transaction(async tx => {
            const inserted = await tx.query(
                `INSERT INTO user_audit_logs
                    (correlation_id, event_timestamp, username, http_method, endpoint, status_code, duration_ms, client_ip)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                 RETURNING id`,
                [
                    record.traceId,
                    record.startedAt.toISOString(),
                    record.principal,
                    record.httpMethod,
                    record.path,
                    record.statusCode,
                    record.durationMs,
                    record.clientAddress
                ]
            );

            const returned = InsertedLogRowSchema.safeParse(inserted.rows[0]);
            if (!returned.success) {
                throw new Error('Audit log insert returned no id');
            }
            const auditId = returned.data.id;

            await tx.query(
                `INSERT INTO audit_payloads
                    (audit_id, request_payload, response_payload, error_details, user_roles)
                 VALUES ($1, $2::jsonb, $3::jsonb, $4, $5)`,
                [
                    auditId,
                    toJsonbParam(record.requestBody),
                    toJsonbParam(record.responseBody),
                    record.error ?? null,
                    formatRoles(record.roles)
                ]
            );
        });
    }
}
