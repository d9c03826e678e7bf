/**
 * Connection setup for the optional Postgres task store and Redis lease.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

const TAG = '[db]';

/**
 * Postgres pool for the task store. One polling loop issues one query at
 * a time, so the pool stays small.
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 4,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    });
    pool.on('error', (err) => console.error(`${TAG} idle client error:`, err));
    return pool;
}

/** Redis client for the orchestrator lease */
export function createRedis(url: string): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: true });
    redis.on('error', (err) => console.error(`${TAG} redis error:`, err.message));
    return redis;
}
