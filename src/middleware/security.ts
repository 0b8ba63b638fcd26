/**
 * Security Middleware
 *
 * Implements:
 * - Redis-backed rate limiting with per-route tiers (in-memory fallback)
 * - Security headers
 */

import { Request, Response, NextFunction } from 'express';
import Redis from 'ioredis';
import { RateLimiterAbstract, RateLimiterMemory, RateLimiterRedis, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '../services/observabilityService';
import { errorResponse } from '../utils/response';
import './userContext'; // Request.userContext

// ============================================================================
// RATE LIMITING (Redis-backed with in-memory fallback)
// ============================================================================

interface RateLimitTier {
    points: number;    // Max requests
    duration: number;  // Window in seconds
}

export type RateLimitTierName = 'general' | 'batch' | 'test';

export const RATE_LIMIT_TIERS: Record<RateLimitTierName, RateLimitTier> = {
    general: { points: 100, duration: 60 },   // 100 req/min default
    batch: { points: 10, duration: 60 },      // 10 req/min for batch add/delete
    test: { points: 5, duration: 60 },        // 5 req/min for channel test sends
};

let rateLimiters: Partial<Record<RateLimitTierName, RateLimiterAbstract>> = {};

/**
 * Initialize rate limiters.
 * Uses Redis when available, falls back to in-memory.
 */
export function initRateLimiters(redis: Redis | null): void {
    const tiers: RateLimitTierName[] = ['general', 'batch', 'test'];
    rateLimiters = {};

    for (const tier of tiers) {
        const config = RATE_LIMIT_TIERS[tier];
        rateLimiters[tier] = redis
            ? new RateLimiterRedis({
                storeClient: redis,
                keyPrefix: `rl:${tier}`,
                points: config.points,
                duration: config.duration,
            })
            : new RateLimiterMemory({
                keyPrefix: `rl:${tier}`,
                points: config.points,
                duration: config.duration,
            });
    }

    logger.info('Rate limiters initialized', {
        backend: redis ? 'redis' : 'memory',
        tiers,
    });
}

/**
 * Determine which rate limit tier applies to a request.
 * Paths are relative to the /api mount.
 */
export function getTier(req: Pick<Request, 'path' | 'method'>): RateLimitTierName {
    const path = req.path.toLowerCase();
    if (req.method === 'POST' && /^\/channels\/[^/]+\/[^/]+\/test\/?$/.test(path)) return 'test';
    if (req.method === 'POST' && /^\/domains\/batch(-delete)?\/?$/.test(path)) return 'batch';
    return 'general';
}

function getClientIdentifier(req: Request): string {
    const userId = req.userContext?.userId;
    if (userId !== undefined) {
        return `user:${userId}`;
    }
    return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

/**
 * Rate limiting middleware. Mounted after the user context so limits are
 * per user.
 */
export async function rateLimit(req: Request, res: Response, next: NextFunction): Promise<void> {
    const tier = getTier(req);
    const limiter = rateLimiters[tier] ?? rateLimiters.general;

    if (!limiter) {
        // Limiters not initialized yet: allow request
        next();
        return;
    }

    const identifier = getClientIdentifier(req);
    const points = RATE_LIMIT_TIERS[tier].points;

    try {
        const result = await limiter.consume(identifier);

        res.setHeader('X-RateLimit-Limit', points);
        res.setHeader('X-RateLimit-Remaining', result.remainingPoints);
        res.setHeader('X-RateLimit-Reset', new Date(Date.now() + result.msBeforeNext).toISOString());

        next();
    } catch (rejection) {
        if (!(rejection instanceof RateLimiterRes)) {
            // Store failure (Redis down): let the request through
            logger.error('[RATE_LIMIT] Limiter store error', rejection instanceof Error ? rejection : undefined, { tier });
            next();
            return;
        }

        const retryAfter = Math.ceil((rejection.msBeforeNext || 60000) / 1000);

        res.setHeader('Retry-After', retryAfter);
        res.setHeader('X-RateLimit-Limit', points);
        res.setHeader('X-RateLimit-Remaining', 0);

        errorResponse(res, 429, 'Too Many Requests', { retryAfter });
    }
}

// ============================================================================
// SECURITY HEADERS
// ============================================================================

export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    res.setHeader('Content-Security-Policy', "default-src 'self'");
    next();
}
