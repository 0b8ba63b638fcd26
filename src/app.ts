/**
 * Express application.
 *
 * Built from a container so the bootstrap in index.ts only deals with
 * connections, listening and shutdown.
 */

import express from 'express';
import cors from 'cors';
import { Container } from './container';
import { createChannelConfigController } from './controllers/channelConfigController';
import { createDomainController } from './controllers/domainController';
import { asyncHandler } from './middleware/asyncHandler';
import { rateLimit, securityHeaders } from './middleware/security';
import { createUserContextMiddleware, resolveJwtSecret } from './middleware/userContext';
import { createChannelRouter } from './routes/channels';
import { createDomainRouter } from './routes/domains';
import { createRegionRouter } from './routes/regions';
import { checkDatabaseHealth } from './db/pool';
import {
    correlationMiddleware,
    getMetrics,
    logger,
    metricsMiddleware,
    requestLoggingMiddleware,
} from './services/observabilityService';
import { isAppError } from './utils/appError';
import { errorResponse } from './utils/response';
import { checkRedisHealth } from './utils/redis';

/**
 * Status code carried by body-parser errors (malformed JSON, body too large).
 */
function clientErrorStatus(err: Error): number | null {
    if (!('status' in err)) return null;
    const status = err.status;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(container: Container): express.Express {
    const { config } = container;
    const app = express();

    app.use(cors({
        origin: config.frontendUrl || (config.env === 'production' ? '' : 'http://localhost:3000'),
        credentials: true,
        methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
    }));
    app.use(express.json({ limit: '1mb' }));

    // Security headers on all responses
    app.use(securityHeaders);

    // Correlation ID, metrics and access log
    app.use(correlationMiddleware);
    app.use(metricsMiddleware);
    app.use(requestLoggingMiddleware);

    // ========================================================================
    // HEALTH CHECK: Verifies all dependencies
    // ========================================================================

    app.get('/health', asyncHandler(async (req: express.Request, res: express.Response) => {
        const [dbStatus, redisStatus, queueStatus] = await Promise.all([
            checkDatabaseHealth(container.pool),
            checkRedisHealth(),
            container.queue.getStatus(),
        ]);
        const reconciler = container.reconciler.getStatus();

        const components = {
            database: dbStatus,
            redis: redisStatus,
            monitorQueue: {
                status: queueStatus.isRunning ? 'active' : 'stopped',
                backend: queueStatus.backend,
                active: queueStatus.activeCount,
                waiting: queueStatus.waitingCount,
                failed: queueStatus.failedCount,
                lastProcessedAt: queueStatus.lastProcessedAt,
                lastError: queueStatus.lastError,
            },
            reconciler: {
                status: reconciler.isRunning ? 'active' : 'stopped',
                lastRunAt: reconciler.lastRunAt,
                lastError: reconciler.lastError,
                lastPass: reconciler.lastPass,
            },
            providers: container.providers.list().map(client => client.provider),
            channels: container.dispatchers.map(dispatcher => dispatcher.channelType),
        };

        const allHealthy = dbStatus.status === 'healthy' &&
            (redisStatus.status === 'healthy' || redisStatus.status === 'not_configured');

        res.status(allHealthy ? 200 : 503).json({
            status: allHealthy ? 'ok' : 'degraded',
            timestamp: new Date(),
            uptime: Math.floor(process.uptime()),
            components
        });
    }));

    // Metrics endpoint for observability
    app.get('/metrics', (req, res) => {
        res.json(getMetrics());
    });

    // ========================================================================
    // API ROUTES (authenticated, rate limited per user)
    // ========================================================================

    app.use('/api', createUserContextMiddleware(resolveJwtSecret(config.jwtSecret, config.env)));
    app.use('/api', rateLimit);

    app.use('/api/regions', createRegionRouter(container.regionResolver));
    app.use('/api/domains', createDomainRouter(createDomainController(container.domainService)));
    app.use('/api/channels', createChannelRouter(createChannelConfigController(container.channelConfigService)));

    // ========================================================================
    // ERROR HANDLING
    // ========================================================================

    app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (isAppError(err)) {
            errorResponse(res, err.statusCode, err.message);
            return;
        }

        const clientStatus = clientErrorStatus(err);
        if (clientStatus !== null) {
            errorResponse(res, clientStatus, err.message);
            return;
        }

        logger.error('Unhandled error', err, {
            method: req.method,
            path: req.path,
            ip: req.ip,
            correlationId: req.correlationId
        });
        errorResponse(res, 500, 'Internal server error', {
            message: config.env === 'development' ? err.message : undefined
        });
    });

    return app;
}
