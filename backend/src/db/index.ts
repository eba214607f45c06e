import { DatabaseError, Pool } from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import { config } from '../config';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('db');

// serialization_failure, deadlock_detected: the transaction was rolled back and may be replayed
const RETRYABLE_CODES = new Set(['40001', '40P01']);
const MAX_TRANSACTION_ATTEMPTS = 3;

let pool: Pool | null = null;

function poolConfig(): PoolConfig {
    return {
        connectionString: config.databaseUrl,
        max: config.dbPoolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        statement_timeout: config.dbStatementTimeoutMs,
        application_name: 'support-auth',
    };
}

export function getPool(): Pool {
    if (!pool) {
        pool = new Pool(poolConfig());
        pool.on('error', (err) => {
            log.error({ err }, 'Idle database client failed');
        });
    }
    return pool;
}

/** First line of a statement, enough to recognise it in the logs */
function statementLabel(text: string): string {
    return text.trim().split('\n')[0].slice(0, 80);
}

export async function query<T = Record<string, unknown>>(text: string, params?: unknown[]): Promise<T[]> {
    const start = Date.now();
    const result = await getPool().query(text, params);
    log.debug({ statement: statementLabel(text), durationMs: Date.now() - start, rows: result.rowCount }, 'Query');
    return result.rows;
}

export async function queryOne<T = Record<string, unknown>>(text: string, params?: unknown[]): Promise<T | null> {
    const rows = await query<T>(text, params);
    return rows[0] ?? null;
}

export function isRetryableTransactionError(err: unknown): boolean {
    return err instanceof DatabaseError && err.code !== undefined && RETRYABLE_CODES.has(err.code);
}

async function runTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        // A failed ROLLBACK must not hide the error that caused it
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
            log.error({ err: rollbackErr }, 'Rollback failed');
        });
        throw err;
    } finally {
        client.release();
    }
}

/**
 * Runs `fn` inside BEGIN/COMMIT. Serialization failures and deadlocks are
 * replayed up to three attempts, so `fn` must only touch the database.
 */
export async function transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
        try {
            return await runTransaction(fn);
        } catch (err) {
            if (!isRetryableTransactionError(err) || attempt >= MAX_TRANSACTION_ATTEMPTS) throw err;
            log.warn({ err, attempt }, 'Transaction conflict, retrying');
        }
    }
}

/** Readiness check: true when a connection can run a statement */
export async function pingDatabase(): Promise<boolean> {
    try {
        await getPool().query('SELECT 1');
        return true;
    } catch (err) {
        log.warn({ err }, 'Database ping failed');
        return false;
    }
}

export async function closePool(): Promise<void> {
    if (pool) {
        await pool.end();
        pool = null;
    }
}
