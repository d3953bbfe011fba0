import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

export type Database = Queryable & {
    transaction<T>(callback: (tx: TxClient) => Promise<T>): Promise<T>;
    close(): Promise<void>;
};

let pool: pg.Pool | null = null;

/**
 * PostgreSQL pool, created on first use.
 * Configuration is guarded here rather than at import so that modules
 * depending on the db facade can load without a database environment.
 */
function getPool(): pg.Pool {
    if (pool) return pool;

    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const isProtectedEnv = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'staging';
    const poolMax = process.env.DB_POOL_MAX ? parseInt(process.env.DB_POOL_MAX, 10) : 10;

    pool = new Pool({
        host: process.env.DB_HOST,
        port: parseInt(process.env.DB_PORT ?? '', 10),
        user: process.env.DB_USER,
        password: process.env.DB_PASSWORD,
        database: process.env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: isProtectedEnv || process.env.DB_SSL === 'true'
            ? { rejectUnauthorized: true, ca: process.env.DB_CA_CERT }
            : false
    });

    pool.on('error', error => {
        logger.error({ error }, '[DB] Idle client error');
    });

    return pool;
}

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

export const db: Database = {
    query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) => {
        try {
            return await getPool().query<T>(text, params);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure');
        }
    },

    /**
     * Executes a callback within a managed transaction.
     * Rolls back on error; a client whose rollback failed is destroyed.
     */
    transaction: async <T>(callback: (tx: TxClient) => Promise<T>): Promise<T> => {
        const client = await getPool().connect();
        let forceDestroy = false;
        try {
            await client.query('BEGIN');
            const tx: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };
            const result = await callback(tx);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                forceDestroy = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:TransactionFailed');
        } finally {
            releaseClient(client, forceDestroy, 'transaction');
        }
    },

    close: async () => {
        if (!pool) return;
        const closing = pool;
        pool = null;
        await closing.end();
    }
};
