/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping, information disclosure prevention and the
 * summaries recorded for failed operations.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, ServiceError, statusCodeOf, summarizeError } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should create ServiceError with incidentId', () => {
        const error = new ServiceError('Test error', { secret: 'hidden' });

        assert.match(error.incidentId, /^[0-9a-f-]{36}$/);
        assert.strictEqual(error.publicMessage, 'Test error');
        assert.strictEqual(error.name, 'ServiceError');
    });

    it('should sanitize raw errors into ServiceError', () => {
        const rawError = Object.assign(new Error('Database connection failed: password=test-password'), { code: '28P01' });
        const sanitized = ErrorSanitizer.sanitize(rawError, 'db-op');

        assert.ok(sanitized instanceof ServiceError);
        assert.strictEqual(sanitized.publicMessage, 'An internal system error occurred. Please contact support with ID: db-op');
        assert.strictEqual(sanitized.contextLabel, 'db-op');
        assert.strictEqual(sanitized.sqlState, '28P01');
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should pass through existing ServiceError unchanged', () => {
        const original = new ServiceError('Original', { data: 'test' });
        const result = ErrorSanitizer.sanitize(original, 'test-context');

        assert.strictEqual(result, original);
    });
});

describe('summarizeError', () => {
    it('should combine name and message', () => {
        assert.strictEqual(summarizeError(new TypeError('bad input')), 'TypeError: bad input');
    });

    it('should fall back to the name for an empty message', () => {
        assert.strictEqual(summarizeError(new RangeError()), 'RangeError');
    });

    it('should stringify non-error throwables', () => {
        assert.strictEqual(summarizeError('plain failure'), 'plain failure');
        assert.strictEqual(summarizeError(42), '42');
        assert.strictEqual(summarizeError(Object.create(null)), 'Unknown error');
    });
});

describe('statusCodeOf', () => {
    it('should read statusCode before status', () => {
        assert.strictEqual(statusCodeOf({ statusCode: 404, status: 500 }), 404);
        assert.strictEqual(statusCodeOf({ status: 409 }), 409);
    });

    it('should ignore values outside the HTTP range', () => {
        assert.strictEqual(statusCodeOf({ statusCode: 42 }), undefined);
        assert.strictEqual(statusCodeOf({ status: '404' }), undefined);
        assert.strictEqual(statusCodeOf(new Error('no status')), undefined);
        assert.strictEqual(statusCodeOf(undefined), undefined);
    });
});
