import express from 'express';
import cors from 'cors';
import { Server } from 'http';

import { getConfig } from './config';

// Import middleware
import { rateLimit, securityHeaders, initRateLimiters, requireApiKey } from './middleware/security';
import { asyncHandler } from './middleware/asyncHandler';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

// Import Redis
import { initRedis, checkRedisHealth, disconnectRedis } from './utils/redis';

// Import routes
import eventRoutes from './routes/events';
import leadRoutes from './routes/leads';
import routingRoutes from './routes/routing';
import adminRoutes from './routes/admin';

// Import services for wiring
import {
    logger,
    correlationMiddleware,
    metricsMiddleware,
    requestLoggingMiddleware,
    getMetrics
} from './services/observabilityService';
import { initSignalStore, getSignalStore, closeSignalStore } from './services/signalStore';
import { initEventQueue, getQueueStatus, shutdownEventQueue } from './services/eventQueue';
import { initCommandDispatcher, shutdownCommandDispatcher } from './services/commandDispatcher';
import {
    startReconciliationWorker,
    stopReconciliationWorker,
    getReconciliationWorkerStatus
} from './services/reconciliationWorker';

// ============================================================================
// APPLICATION
// ============================================================================

export function createApp(): express.Express {
    const { env } = getConfig();
    const app = express();

    app.use(cors({
        origin: env.FRONTEND_URL || (env.NODE_ENV === 'production' ? '' : 'http://localhost:3000'),
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID', 'X-Request-ID']
    }));
    app.use(express.json({ limit: '5mb' }));

    // Security headers on all responses
    app.use(securityHeaders);

    // Correlation ID, metrics and access log
    app.use(correlationMiddleware);
    app.use(metricsMiddleware);
    app.use(requestLoggingMiddleware);

    // ========================================================================
    // HEALTH CHECK: verifies all dependencies
    // ========================================================================

    app.get('/health', asyncHandler(async (_req: express.Request, res: express.Response) => {
        const store = await getSignalStore().healthCheck();
        const redis = await checkRedisHealth();
        const queue = await getQueueStatus();
        const reconciliation = getReconciliationWorkerStatus();

        const allHealthy = store.status === 'healthy' &&
            (redis.status === 'healthy' || redis.status === 'not_configured');

        res.status(allHealthy ? 200 : 503).json({
            status: allHealthy ? 'ok' : 'degraded',
            timestamp: new Date(),
            version: env.APP_VERSION,
            uptime: Math.floor(process.uptime()),
            components: {
                store,
                redis,
                eventQueue: {
                    status: queue.isRunning ? 'active' : 'disabled',
                    mode: queue.mode,
                    active: queue.activeCount,
                    waiting: queue.waitingCount,
                    failed: queue.failedCount,
                    lastProcessedAt: queue.lastProcessedAt
                },
                reconciliationWorker: {
                    status: reconciliation.running ? 'active' : 'not_started',
                    sweepInProgress: reconciliation.sweepInProgress,
                    lastRunAt: reconciliation.lastRunAt,
                    lastError: reconciliation.lastError
                }
            }
        });
    }));

    // Metrics endpoint for observability
    app.get('/metrics', (_req, res) => {
        res.json(getMetrics());
    });

    // Rate limiting and API key on API routes
    app.use('/api', rateLimit);
    app.use('/api', requireApiKey);

    // API Routes
    app.use('/api/events', eventRoutes);
    app.use('/api/leads', leadRoutes);
    app.use('/api/routing', routingRoutes);
    app.use('/api/admin', adminRoutes);

    // ========================================================================
    // ERROR HANDLING
    // ========================================================================

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

// ============================================================================
// SERVER STARTUP
// ============================================================================

export function startServer(): Server {
    const { env } = getConfig();

    // Initialize store, Redis, rate limiters and queues
    initSignalStore();
    initRedis();
    initRateLimiters();
    initCommandDispatcher();
    const queueStarted = initEventQueue();

    const app = createApp();
    const server = app.listen(env.PORT, () => {
        logger.info(`Server started on port ${env.PORT}`, {
            port: env.PORT,
            env: env.NODE_ENV,
            queue: queueStarted ? 'bullmq' : 'inline'
        });

        startReconciliationWorker();
    });

    // ========================================================================
    // GRACEFUL SHUTDOWN
    // ========================================================================

    async function gracefulShutdown(signal: string): Promise<void> {
        logger.info(`${signal} received, shutting down gracefully`);

        // Stop accepting new connections
        server.close(() => {
            logger.info('HTTP server closed');
        });

        stopReconciliationWorker();

        try {
            await shutdownEventQueue();
        } catch (err) {
            logger.error('Error shutting down event queue', err);
        }

        try {
            await shutdownCommandDispatcher();
        } catch (err) {
            logger.error('Error shutting down command dispatcher', err);
        }

        try {
            await closeSignalStore();
            logger.info('Signal store closed');
        } catch (err) {
            logger.error('Error closing signal store', err);
        }

        try {
            await disconnectRedis();
        } catch (err) {
            logger.error('Error disconnecting Redis', err);
        }

        process.exit(0);
    }

    process.on('SIGTERM', () => {
        gracefulShutdown('SIGTERM').catch((err: unknown) => logger.error('Shutdown failed', err));
    });
    process.on('SIGINT', () => {
        gracefulShutdown('SIGINT').catch((err: unknown) => logger.error('Shutdown failed', err));
    });

    return server;
}

if (require.main === module) {
    startServer();
}
