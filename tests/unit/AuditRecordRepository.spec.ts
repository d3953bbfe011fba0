/**
 * Unit Tests: AuditRecordRepository
 *
 * @see libs/audit/auditRepository.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { AuditRecordRepository, formatRoles, toJsonbParam } from '../../libs/audit/auditRepository.js';
import { AuditRecord } from '../../libs/audit/schema.js';

const RECORD: AuditRecord = {
    traceId: '7d9f8a52-3c1e-4f4b-9a51-2b7c0e6d1f00',
    principal: 'alice',
    roles: ['admin', 'auditor'],
    httpMethod: 'POST',
    path: '/api/ext/login',
    requestBody: '{"password":"****","user":"a"}',
    error: 'Error: boom',
    startedAt: new Date('2026-03-01T10:00:00.000Z'),
    durationMs: 12,
    statusCode: 500,
    clientAddress: '10.0.0.7'
};

function transactionalClient(insertedRows: unknown[] = [{ id: '41' }]) {
    const query = mock.fn(async (text: string, _params?: unknown[]) =>
        ({ rows: text.includes('RETURNING id') ? insertedRows : [] })
    );
    const transaction = mock.fn(async <T>(callback: (tx: { query: typeof query }) => Promise<T>): Promise<T> =>
        callback({ query })
    );
    return { query, transaction };
}

describe('AuditRecordRepository', () => {
    it('should write the log row and its payload in one transaction', async () => {
        const client = transactionalClient();
        const repository = new AuditRecordRepository(client);

        await repository.store(RECORD);

        assert.strictEqual(client.transaction.mock.calls.length, 1);
        assert.strictEqual(client.query.mock.calls.length, 2);

        const [logSql, logParams] = client.query.mock.calls[0]?.arguments ?? [];
        assert.match(logSql ?? '', /INSERT INTO user_audit_logs/);
        assert.deepStrictEqual(logParams, [
            '7d9f8a52-3c1e-4f4b-9a51-2b7c0e6d1f00',
            '2026-03-01T10:00:00.000Z',
            'alice',
            'POST',
            '/api/ext/login',
            500,
            12,
            '10.0.0.7'
        ]);

        const [payloadSql, payloadParams] = client.query.mock.calls[1]?.arguments ?? [];
        assert.match(payloadSql ?? '', /INSERT INTO audit_payloads/);
        assert.deepStrictEqual(payloadParams, [
            '41',
            '{"password":"****","user":"a"}',
            null,
            'Error: boom',
            'admin,auditor'
        ]);
    });

    it('should fail when the log insert returns no id', async () => {
        const repository = new AuditRecordRepository(transactionalClient([]));

        await assert.rejects(repository.store(RECORD), /returned no id/);
    });

    it('should format roles as a comma list or "none"', () => {
        assert.strictEqual(formatRoles(['a', 'b']), 'a,b');
        assert.strictEqual(formatRoles([]), 'none');
    });

    it('should keep JSON bodies and quote diagnostic placeholders', () => {
        assert.strictEqual(toJsonbParam('{"a":1}'), '{"a":1}');
        assert.strictEqual(toJsonbParam('[payload masking failed: boom]'), '"[payload masking failed: boom]"');
        assert.strictEqual(toJsonbParam(undefined), null);
    });
});
