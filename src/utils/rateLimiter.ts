/**
 * Rate Limiter Utility
 *
 * Fixed-cadence ticker for outbound provider calls. One tick is emitted per
 * interval and each tick admits exactly one caller, so concurrent callers
 * share the provider's request rate without any extra locking.
 *
 * - Waiters are admitted first-in first-out
 * - At most one unclaimed tick is buffered; idle time does not bank a burst
 * - No retries: a failed call is the caller's problem
 */

import { logger } from '../services/observabilityService';

interface TickRateLimiterConfig {
    name: string;
    intervalMs: number;       // One request per interval
    queueLimit?: number;      // Maximum waiting callers (default: 1000)
}

interface Waiter {
    resolve: () => void;
    reject: (error: Error) => void;
}

export class RateLimiterStoppedError extends Error {
    constructor(name: string) {
        super(`Rate limiter "${name}" stopped`);
        this.name = 'RateLimiterStoppedError';
    }
}

export class TickRateLimiter {
    private readonly name: string;
    private readonly intervalMs: number;
    private readonly queueLimit: number;
    private waiters: Waiter[] = [];
    private bufferedTick = false;
    private timer: NodeJS.Timeout | null = null;
    private stopped = false;
    private admitted = 0;

    constructor(config: TickRateLimiterConfig) {
        this.name = config.name;
        this.intervalMs = config.intervalMs;
        this.queueLimit = config.queueLimit ?? 1000;
    }

    /**
     * Block until a tick is available. The ticker starts on first use.
     */
    acquire(): Promise<void> {
        if (this.stopped) {
            return Promise.reject(new RateLimiterStoppedError(this.name));
        }

        this.ensureTicking();

        if (this.bufferedTick) {
            this.bufferedTick = false;
            this.admitted++;
            return Promise.resolve();
        }

        if (this.waiters.length >= this.queueLimit) {
            return Promise.reject(new Error(`Rate limiter "${this.name}" queue full (${this.queueLimit} waiting)`));
        }

        return new Promise<void>((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    /**
     * Execute a function once a tick has been obtained.
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        return fn();
    }

    /**
     * Stop ticking and reject everyone still waiting.
     */
    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.stopped = true;
        this.bufferedTick = false;

        const pending = this.waiters;
        this.waiters = [];
        for (const waiter of pending) {
            waiter.reject(new RateLimiterStoppedError(this.name));
        }

        if (pending.length > 0) {
            logger.warn('[RATE_LIMITER] Stopped with callers still waiting', { limiter: this.name, rejected: pending.length });
        }
    }

    getStats(): {
        name: string;
        intervalMs: number;
        waiting: number;
        admitted: number;
        running: boolean;
    } {
        return {
            name: this.name,
            intervalMs: this.intervalMs,
            waiting: this.waiters.length,
            admitted: this.admitted,
            running: this.timer !== null
        };
    }

    private ensureTicking(): void {
        if (this.timer) return;

        this.timer = setInterval(() => this.tick(), this.intervalMs);
        // Never keep the process alive just for the ticker
        this.timer.unref();
    }

    private tick(): void {
        const next = this.waiters.shift();
        if (next) {
            this.admitted++;
            next.resolve();
            return;
        }
        this.bufferedTick = true;
    }
}
