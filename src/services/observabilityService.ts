/**
 * Observability Service
 *
 * - JSON log lines tagged with the request's correlation ID
 * - Request metrics for GET /metrics
 */

import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { getConfig } from '../config';

// ============================================================================
// CORRELATION IDS
// ============================================================================

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Reuse the caller's correlation ID (adapters forward theirs) or mint one.
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
    const correlationId =
        headerValue(req.headers['x-correlation-id']) ||
        headerValue(req.headers['x-request-id']) ||
        randomUUID();

    req.correlationId = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);

    next();
}

// ============================================================================
// STRUCTURED LOGGING
// ============================================================================

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

type LogContext = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    correlationId?: string;
    context?: LogContext;
    error?: {
        name: string;
        message: string;
        stack?: string;
    };
}

export class StructuredLogger {
    private log(level: LogLevel, message: string, data: LogContext = {}, error?: Error): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[getConfig().env.LOG_LEVEL]) {
            return;
        }

        const { correlationId, ...context } = data;
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            correlationId: typeof correlationId === 'string' ? correlationId : undefined,
            context
        };

        if (error) {
            entry.error = {
                name: error.name,
                message: error.message,
                stack: error.stack
            };
        }

        // Output as JSON for log aggregation
        const line = JSON.stringify(entry);
        if (level === 'error') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    debug(message: string, data?: LogContext): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: LogContext): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: LogContext): void {
        this.log('warn', message, data);
    }

    error(message: string, error?: unknown, data?: LogContext): void {
        this.log('error', message, data, toError(error));
    }
}

function toError(value: unknown): Error | undefined {
    if (value === undefined) return undefined;
    if (value instanceof Error) return value;
    return new Error(String(value));
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
        const endpoint = `${req.method} ${typeof routePath === 'string' ? routePath : req.path}`;

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
export function getMetrics(): Omit<Metrics, 'latency'> & { latency: Omit<Metrics['latency'], 'samples'> } {
    calculateLatencyPercentiles();
    return {
        ...metrics,
        latency: {
            avg: Math.round(metrics.latency.avg),
            p95: metrics.latency.p95,
            p99: metrics.latency.p99
        }
    };
}

// ============================================================================
// REQUEST LOGGING MIDDLEWARE
// ============================================================================

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        logger.debug('[HTTP] Request completed', {
            correlationId: req.correlationId,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            latency: Date.now() - start
        });
    });

    next();
}

// ============================================================================
// TYPE EXTENSIONS
// ============================================================================

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            correlationId?: string;
        }
    }
}
