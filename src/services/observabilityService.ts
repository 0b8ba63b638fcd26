/**
 * Observability Service
 *
 * - Structured JSON logging with correlation IDs
 * - Request metrics (totals, status counts, latency percentiles)
 * - Access log middleware
 */

import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

// ============================================================================
// CORRELATION IDS
// ============================================================================

export function generateCorrelationId(): string {
    return randomUUID();
}

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Correlation ID middleware - attaches ID to all requests.
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
    // Reuse an upstream ID when the proxy sent one
    const correlationId =
        headerValue(req.headers['x-correlation-id']) ||
        headerValue(req.headers['x-request-id']) ||
        generateCorrelationId();

    req.correlationId = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);

    next();
}

// ============================================================================
// STRUCTURED LOGGING
// ============================================================================

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    correlationId?: string;
    context?: LogData;
    error?: {
        name: string;
        message: string;
        stack?: string;
    };
}

export class StructuredLogger {
    private context: LogData = {};

    /**
     * Create a child logger with additional context.
     */
    child(context: LogData): StructuredLogger {
        const child = new StructuredLogger();
        child.context = { ...this.context, ...context };
        return child;
    }

    private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
        const correlationId = data?.correlationId ?? this.context.correlationId;
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            correlationId: typeof correlationId === 'string' ? correlationId : undefined,
            context: { ...this.context, ...data }
        };

        if (error) {
            entry.error = {
                name: error.name,
                message: error.message,
                stack: error.stack
            };
        }

        // One JSON object per line for log aggregation
        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: LogData): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: LogData): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: LogData): void {
        this.log('warn', message, data);
    }

    error(message: string, error?: Error, data?: LogData): void {
        this.log('error', message, data, error);
    }
}

export const logger = new StructuredLogger();

// ============================================================================
// METRICS COLLECTION
// ============================================================================

interface Metrics {
    requests: {
        total: number;
        byEndpoint: Record<string, number>;
        byStatus: Record<number, number>;
    };
    latency: {
        avg: number;
        p95: number;
        p99: number;
        samples: number[];
    };
    errors: number;
    startTime: number;
}

const metrics: Metrics = {
    requests: {
        total: 0,
        byEndpoint: {},
        byStatus: {}
    },
    latency: {
        avg: 0,
        p95: 0,
        p99: 0,
        samples: []
    },
    errors: 0,
    startTime: Date.now()
};

const MAX_LATENCY_SAMPLES = 1000;

/**
 * Metrics collection middleware.
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const latency = Date.now() - start;
        const routePath: unknown = req.route?.path;
        const endpoint = `${req.method} ${typeof routePath === 'string' ? req.baseUrl + routePath : req.path}`;

        metrics.requests.total++;
        metrics.requests.byEndpoint[endpoint] = (metrics.requests.byEndpoint[endpoint] || 0) + 1;
        metrics.requests.byStatus[res.statusCode] = (metrics.requests.byStatus[res.statusCode] || 0) + 1;

        if (res.statusCode >= 400) {
            metrics.errors++;
        }

        metrics.latency.samples.push(latency);
        if (metrics.latency.samples.length > MAX_LATENCY_SAMPLES) {
            metrics.latency.samples.shift();
        }

        if (metrics.requests.total % 100 === 0) {
            calculateLatencyPercentiles();
        }
    });

    next();
}

function calculateLatencyPercentiles(): void {
    const sorted = [...metrics.latency.samples].sort((a, b) => a - b);
    const len = sorted.length;

    if (len === 0) return;

    metrics.latency.avg = sorted.reduce((a, b) => a + b, 0) / len;
    metrics.latency.p95 = sorted[Math.floor(len * 0.95)] || 0;
    metrics.latency.p99 = sorted[Math.floor(len * 0.99)] || 0;
}

/**
 * Get current metrics.
 */
export function getMetrics(): Omit<Metrics, 'latency'> & { latency: Omit<Metrics['latency'], 'samples'>; uptimeSeconds: number } {
    calculateLatencyPercentiles();
    return {
        ...metrics,
        latency: {
            avg: Math.round(metrics.latency.avg),
            p95: metrics.latency.p95,
            p99: metrics.latency.p99
        },
        uptimeSeconds: Math.floor((Date.now() - metrics.startTime) / 1000)
    };
}

// ============================================================================
// REQUEST LOGGING MIDDLEWARE
// ============================================================================

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        logger.info('Request completed', {
            correlationId: req.correlationId,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            latency: Date.now() - start,
            userAgent: req.headers['user-agent']
        });
    });

    next();
}

// ============================================================================
// TYPE EXTENSIONS
// ============================================================================

declare global {
    namespace Express {
        interface Request {
            correlationId?: string;
        }
    }
}
