/**
 * Monitor Queue
 *
 * Background work queue for remote monitor creation. Callers (domain add,
 * region change) enqueue and return at once; workers run the job after a
 * short anti-thundering-herd delay.
 *
 * Two backends:
 *   - BullMQ when Redis is configured (`uptime:monitor-registrations`)
 *   - an in-process bounded pool otherwise
 *
 * Jobs are attempted once. A failed creation is not retried; the next
 * region change or a manual resync covers it.
 */

import { Job, Queue, Worker } from 'bullmq';
import { parseRedisUrl } from '../utils/redis';
import { logger } from './observabilityService';

// ============================================================================
// TYPES
// ============================================================================

export type MonitorJobKind = 'create' | 'recreate';

export interface MonitorJob {
    kind: MonitorJobKind;
    domainId: number;
}

export type MonitorJobHandler = (job: MonitorJob) => Promise<void>;

export interface MonitorQueueStatus {
    backend: 'bullmq' | 'in-process';
    isRunning: boolean;
    activeCount: number;
    waitingCount: number;
    failedCount: number;
    completedCount: number;
    lastProcessedAt: Date | null;
    lastError: string | null;
}

export interface MonitorQueue {
    /** Attach the processor and begin consuming jobs. */
    start(handler: MonitorJobHandler): void;
    enqueue(job: MonitorJob): Promise<void>;
    getStatus(): Promise<MonitorQueueStatus>;
    /** Stop intake and let jobs already taken finish. */
    shutdown(): Promise<void>;
}

export const MONITOR_QUEUE_NAME = 'uptime:monitor-registrations';

const DEFAULT_MAX_PENDING = 1000;

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function describeJob(job: MonitorJob): Record<string, unknown> {
    return { kind: job.kind, domainId: job.domainId };
}

// ============================================================================
// IN-PROCESS POOL
// ============================================================================

export interface InProcessMonitorQueueOptions {
    concurrency: number;
    delayMs: number;
    maxPending?: number;
}

export class InProcessMonitorQueue implements MonitorQueue {
    private readonly concurrency: number;
    private readonly delayMs: number;
    private readonly maxPending: number;
    private handler: MonitorJobHandler | null = null;
    private pending: MonitorJob[] = [];
    private running = 0;
    private accepting = true;
    private idleWaiters: Array<() => void> = [];
    private status: Pick<MonitorQueueStatus, 'failedCount' | 'completedCount' | 'lastProcessedAt' | 'lastError'> = {
        failedCount: 0,
        completedCount: 0,
        lastProcessedAt: null,
        lastError: null,
    };

    constructor(options: InProcessMonitorQueueOptions) {
        this.concurrency = Math.max(1, options.concurrency);
        this.delayMs = options.delayMs;
        this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
    }

    start(handler: MonitorJobHandler): void {
        this.handler = handler;
        logger.info('[QUEUE] In-process monitor queue started', { concurrency: this.concurrency, delayMs: this.delayMs });
        this.pump();
    }

    async enqueue(job: MonitorJob): Promise<void> {
        if (!this.accepting) {
            throw new Error('Monitor queue is shutting down');
        }
        if (this.pending.length >= this.maxPending) {
            throw new Error(`Monitor queue full (${this.maxPending} jobs pending)`);
        }

        this.pending.push(job);
        this.pump();
    }

    /**
     * Resolves once nothing is pending or running.
     */
    onIdle(): Promise<void> {
        if (this.isIdle()) return Promise.resolve();
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    async getStatus(): Promise<MonitorQueueStatus> {
        return {
            backend: 'in-process',
            isRunning: this.accepting && this.handler !== null,
            activeCount: this.running,
            waitingCount: this.pending.length,
            ...this.status,
        };
    }

    async shutdown(): Promise<void> {
        this.accepting = false;
        if (!this.handler && this.pending.length > 0) {
            logger.warn('[QUEUE] Dropping jobs that never had a processor', { dropped: this.pending.length });
            this.pending = [];
        }
        await this.onIdle();
        logger.info('[QUEUE] In-process monitor queue drained');
    }

    private isIdle(): boolean {
        return this.pending.length === 0 && this.running === 0;
    }

    private pump(): void {
        const handler = this.handler;
        if (!handler) return;

        while (this.running < this.concurrency && this.pending.length > 0) {
            const job = this.pending.shift();
            if (!job) break;
            this.running++;
            void this.run(handler, job);
        }

        if (this.isIdle()) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            waiters.forEach(resolve => resolve());
        }
    }

    private async run(handler: MonitorJobHandler, job: MonitorJob): Promise<void> {
        try {
            if (this.delayMs > 0) {
                await sleep(this.delayMs);
            }
            await handler(job);
            this.status.completedCount++;
        } catch (err) {
            this.status.failedCount++;
            this.status.lastError = err instanceof Error ? err.message : String(err);
            logger.error('[QUEUE] Monitor job failed', err instanceof Error ? err : undefined, describeJob(job));
        } finally {
            this.status.lastProcessedAt = new Date();
            this.running--;
            this.pump();
        }
    }
}

// ============================================================================
// BULLMQ
// ============================================================================

export interface BullMqMonitorQueueOptions {
    redisUrl: string;
    concurrency: number;
    delayMs: number;
}

export class BullMqMonitorQueue implements MonitorQueue {
    private readonly queue: Queue<MonitorJob>;
    private readonly connection: ReturnType<typeof parseRedisUrl>;
    private readonly concurrency: number;
    private readonly delayMs: number;
    private worker: Worker<MonitorJob> | null = null;
    private lastProcessedAt: Date | null = null;
    private lastError: string | null = null;

    constructor(options: BullMqMonitorQueueOptions) {
        this.connection = parseRedisUrl(options.redisUrl);
        this.concurrency = options.concurrency;
        this.delayMs = options.delayMs;
        this.queue = new Queue<MonitorJob>(MONITOR_QUEUE_NAME, {
            connection: this.connection,
            defaultJobOptions: {
                attempts: 1,
                removeOnComplete: { count: 1000 },  // Keep the last 1000 for inspection
                removeOnFail: false,                 // Failed creations stay visible
            },
        });
    }

    start(handler: MonitorJobHandler): void {
        if (this.worker) {
            logger.warn('[QUEUE] Monitor worker already running');
            return;
        }

        this.worker = new Worker<MonitorJob>(
            MONITOR_QUEUE_NAME,
            async (job: Job<MonitorJob>) => {
                logger.info('[QUEUE] Processing monitor job', { jobId: job.id, ...describeJob(job.data) });
                await handler(job.data);
            },
            { connection: this.connection, concurrency: this.concurrency }
        );

        this.worker.on('completed', (job: Job<MonitorJob>) => {
            this.lastProcessedAt = new Date();
            logger.info('[QUEUE] Monitor job completed', { jobId: job.id, ...describeJob(job.data) });
        });

        this.worker.on('failed', (job: Job<MonitorJob> | undefined, err: Error) => {
            this.lastProcessedAt = new Date();
            this.lastError = err.message;
            logger.error('[QUEUE] Monitor job failed', err, job ? { jobId: job.id, ...describeJob(job.data) } : undefined);
        });

        this.worker.on('error', (err: Error) => {
            logger.error('[QUEUE] Worker error', err);
        });

        logger.info('[QUEUE] BullMQ monitor queue started', { queue: MONITOR_QUEUE_NAME, concurrency: this.concurrency });
    }

    async enqueue(job: MonitorJob): Promise<void> {
        await this.queue.add(job.kind, job, { delay: this.delayMs });
    }

    async getStatus(): Promise<MonitorQueueStatus> {
        const base = {
            backend: 'bullmq' as const,
            isRunning: this.worker !== null,
            lastProcessedAt: this.lastProcessedAt,
            lastError: this.lastError,
        };

        try {
            const [active, waiting, delayed, failed, completed] = await Promise.all([
                this.queue.getActiveCount(),
                this.queue.getWaitingCount(),
                this.queue.getDelayedCount(),
                this.queue.getFailedCount(),
                this.queue.getCompletedCount(),
            ]);
            return {
                ...base,
                activeCount: active,
                waitingCount: waiting + delayed,
                failedCount: failed,
                completedCount: completed,
            };
        } catch (err) {
            logger.warn('[QUEUE] Could not read queue counts', { error: err instanceof Error ? err.message : String(err) });
            return { ...base, activeCount: 0, waitingCount: 0, failedCount: 0, completedCount: 0 };
        }
    }

    async shutdown(): Promise<void> {
        if (this.worker) {
            logger.info('[QUEUE] Shutting down monitor worker...');
            await this.worker.close();
            this.worker = null;
        }
        await this.queue.close();
        logger.info('[QUEUE] Monitor queue shut down');
    }
}

// ============================================================================
// FACTORY
// ============================================================================

export function createMonitorQueue(options: {
    redisUrl?: string;
    concurrency: number;
    delayMs: number;
}): MonitorQueue {
    if (options.redisUrl) {
        return new BullMqMonitorQueue({
            redisUrl: options.redisUrl,
            concurrency: options.concurrency,
            delayMs: options.delayMs,
        });
    }

    logger.warn('[QUEUE] REDIS_URL not set: monitor creation runs on the in-process pool');
    return new InProcessMonitorQueue({ concurrency: options.concurrency, delayMs: options.delayMs });
}
