/**
 * Redis Client
 *
 * Provides a shared Redis connection for API rate limiting and the monitor
 * queue. Without a URL both fall back to in-process implementations.
 */

import Redis from 'ioredis';
import { logger } from '../services/observabilityService';

let redisClient: Redis | null = null;
let isConnected = false;

export interface RedisConnectionOptions {
    host: string;
    port: number;
    username?: string;
    password?: string;
    tls?: { rejectUnauthorized: boolean };
}

/**
 * Initialize the shared Redis connection.
 * Returns null if no URL is configured.
 */
export function initRedis(redisUrl: string | undefined): Redis | null {
    if (!redisUrl) {
        logger.warn('REDIS_URL not set: using in-memory fallback for rate limiting and the monitor queue');
        return null;
    }

    try {
        redisClient = new Redis(redisUrl, {
            maxRetriesPerRequest: 3,
            retryStrategy(times: number) {
                if (times > 10) return null; // Stop retrying after 10 attempts
                return Math.min(times * 200, 5000);
            },
            lazyConnect: false
        });

        redisClient.on('connect', () => {
            isConnected = true;
            logger.info('Redis connected');
        });

        redisClient.on('error', (err: Error) => {
            isConnected = false;
            logger.error('Redis connection error', err);
        });

        redisClient.on('close', () => {
            isConnected = false;
            logger.warn('Redis connection closed');
        });

        return redisClient;
    } catch (err) {
        logger.error('Failed to initialize Redis', err instanceof Error ? err : undefined);
        return null;
    }
}

export async function checkRedisHealth(): Promise<{ status: string; latencyMs?: number }> {
    if (!redisClient || !isConnected) {
        return { status: redisClient ? 'disconnected' : 'not_configured' };
    }

    try {
        const start = Date.now();
        await redisClient.ping();
        return { status: 'healthy', latencyMs: Date.now() - start };
    } catch {
        return { status: 'unhealthy' };
    }
}

export async function disconnectRedis(): Promise<void> {
    if (redisClient) {
        await redisClient.quit();
        redisClient = null;
        isConnected = false;
        logger.info('Redis disconnected');
    }
}

/**
 * Parse a Redis URL into connection options for BullMQ, which opens its
 * own connections.
 */
export function parseRedisUrl(url: string): RedisConnectionOptions {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new Error('Invalid REDIS_URL format: cannot connect to Redis');
    }

    const options: RedisConnectionOptions = {
        host: parsed.hostname,
        port: parseInt(parsed.port || '6379', 10),
    };

    if (parsed.username) {
        options.username = decodeURIComponent(parsed.username);
    }
    if (parsed.password) {
        options.password = decodeURIComponent(parsed.password);
    }

    // rediss:// means TLS (managed Redis providers)
    if (parsed.protocol === 'rediss:') {
        options.tls = { rejectUnauthorized: false };
    }

    return options;
}
