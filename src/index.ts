import dotenv from 'dotenv';
import { createApp } from './app';
import { buildContainer } from './container';
import { loadConfig } from './config';
import { createPostgresPool } from './db/pool';
import { initRateLimiters } from './middleware/security';
import { logger } from './services/observabilityService';
import { disconnectRedis, initRedis } from './utils/redis';

dotenv.config();

// ============================================================================
// STARTUP
// ============================================================================

const config = loadConfig();

const pool = createPostgresPool(config.databaseUrl, config.databasePoolSize);
const redis = initRedis(config.redisUrl);
initRateLimiters(redis);

const container = buildContainer(config, pool, redis);
const app = createApp(container);

const server = app.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
        port: config.port,
        env: config.env,
        providers: container.providers.list().map(client => client.provider),
    });

    // Start background workers
    container.queue.start(job => container.orchestrator.processJob(job));
    container.reconciler.start();
});

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

async function shutdownStep(name: string, step: () => Promise<void> | void): Promise<void> {
    try {
        await step();
        logger.info(`${name} stopped`);
    } catch (err) {
        logger.error(`Error stopping ${name}`, err instanceof Error ? err : undefined);
    }
}

let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    // Stop accepting new connections
    await shutdownStep('HTTP server', () => new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    }));

    await shutdownStep('Status reconciler', () => container.reconciler.stop());
    await shutdownStep('Monitor queue', () => container.queue.shutdown());
    await shutdownStep('Provider clients', () => container.providers.closeAll());
    await shutdownStep('Notification channels', () => container.dispatchers.forEach(dispatcher => dispatcher.close()));
    await shutdownStep('Database pool', () => pool.end());
    await shutdownStep('Redis', () => disconnectRedis());

    process.exit(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
