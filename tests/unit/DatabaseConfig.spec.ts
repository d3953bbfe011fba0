import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../../libs/bootstrap/config/db-config.js';

describe('Database Configuration Guards', () => {
    const originalEnv = { ...process.env };

    beforeEach(() => {
        process.env.DB_HOST = 'localhost';
        process.env.DB_PORT = '5432';
        process.env.DB_USER = 'audit';
        process.env.DB_PASSWORD = 'test-password';
        process.env.DB_NAME = 'audit';
        delete process.env.DB_CA_CERT;
        delete process.env.DB_SSL;
    });

    afterEach(() => {
        process.env = { ...originalEnv };
    });

    it('should pass with a CA certificate in production', () => {
        process.env.NODE_ENV = 'production';
        process.env.DB_CA_CERT = 'test-ca';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), []);
    });

    it('should require DB_CA_CERT in production', () => {
        process.env.NODE_ENV = 'production';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), [
            'FATAL CONFIG: DB_CA_CERT is required in production/staging'
        ]);
    });

    it('should require DB_CA_CERT in staging', () => {
        process.env.NODE_ENV = 'staging';
        process.env.DB_CA_CERT = '';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), [
            'FATAL CONFIG: DB_CA_CERT is required in production/staging'
        ]);
    });

    it('should allow missing DB_CA_CERT in development', () => {
        process.env.NODE_ENV = 'development';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), []);
    });

    it('should forbid disabling TLS in production', () => {
        process.env.NODE_ENV = 'production';
        process.env.DB_CA_CERT = 'test-ca';
        process.env.DB_SSL = 'false';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), [
            'FATAL CONFIG: DB_SSL=false is forbidden in production/staging (Rule: DB_SSL)'
        ]);
    });

    it('should report every missing connection parameter together', () => {
        process.env.NODE_ENV = 'development';
        delete process.env.DB_HOST;
        process.env.DB_PASSWORD = '   ';
        process.env.DB_PORT = 'not-a-port';

        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS), [
            'FATAL CONFIG: Required env var DB_HOST is missing',
            'FATAL CONFIG: Required env var DB_PASSWORD is missing',
            'FATAL CONFIG: DB_PORT must be an integer'
        ]);
    });
});
