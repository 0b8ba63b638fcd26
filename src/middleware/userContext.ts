/**
 * User Context Middleware
 *
 * Every /api route is scoped to the user named by the bearer token. The
 * token is an HS256 JWT whose payload carries a numeric `userId`.
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { logger } from '../services/observabilityService';
import { UserContext } from '../types';
import { AppError } from '../utils/appError';
import { errorResponse } from '../utils/response';

// ============================================================================
// JWT VERIFICATION
// ============================================================================

const DEV_JWT_SECRET = 'uptime_dev_only_secret_DO_NOT_USE_IN_PROD';

const jwtPayloadSchema = z.object({
    userId: z.coerce.number().int().positive(),
});

/**
 * Production requires a configured secret; elsewhere a dev-only secret is
 * used with a warning.
 */
export function resolveJwtSecret(secret: string | undefined, env: string): string {
    if (secret) return secret;
    if (env === 'production') {
        throw new Error('FATAL: JWT_SECRET is not set in production');
    }
    logger.warn('[USER_CONTEXT] JWT_SECRET not set, using the development secret');
    return DEV_JWT_SECRET;
}

/**
 * Verify a token and extract the user. Returns null for anything invalid
 * or expired.
 */
export function verifyUserToken(token: string, secret: string): UserContext | null {
    let decoded: unknown;
    try {
        decoded = jwt.verify(token, secret);
    } catch {
        return null;
    }

    const parsed = jwtPayloadSchema.safeParse(decoded);
    return parsed.success ? { userId: parsed.data.userId } : null;
}

// Extend Express Request to include the user context
declare global {
    namespace Express {
        interface Request {
            userContext?: UserContext;
        }
    }
}

// ============================================================================
// MIDDLEWARE
// ============================================================================

export function createUserContextMiddleware(secret: string) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const authHeader = req.headers.authorization;
        const token = authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : undefined;
        const context = token ? verifyUserToken(token, secret) : null;

        if (!context) {
            logger.debug('[USER_CONTEXT] Rejected request without a valid token', { path: req.path });
            errorResponse(res, 401, 'Authentication required: provide Authorization: Bearer <token>');
            return;
        }

        req.userContext = context;
        next();
    };
}

/**
 * The authenticated user id. Throws 401 when the middleware did not run.
 */
export function getUserId(req: Request): number {
    const userId = req.userContext?.userId;
    if (userId === undefined) {
        throw new AppError('Authentication required', 401);
    }
    return userId;
}
