/**
 * PostgreSQL Pool
 *
 * Shared pg pool plus the transaction helper used by every multi-statement
 * write. Repositories take a `Pool` and never open transactions themselves
 * except through `withTransaction`.
 */

import { Pool, PoolClient } from 'pg';
import { logger } from '../services/observabilityService';

export function createPostgresPool(connectionString: string, poolSize: number): Pool {
    const pool = new Pool({
        connectionString,
        max: poolSize,
        idleTimeoutMillis: 30_000,
        application_name: 'domain-uptime-orchestrator',
    });

    pool.on('error', (err: Error) => {
        logger.error('[DB] PostgreSQL pool error', err);
    });

    return pool;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client; ROLLBACK on any error.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        client.release();
    }
}

export async function checkDatabaseHealth(pool: Pool): Promise<{ status: string; latencyMs?: number }> {
    try {
        const start = Date.now();
        await pool.query('SELECT 1');
        return { status: 'healthy', latencyMs: Date.now() - start };
    } catch (err) {
        logger.warn('[DB] Health check failed', { error: err instanceof Error ? err.message : String(err) });
        return { status: 'unhealthy' };
    }
}
