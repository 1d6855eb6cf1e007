import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import { getMetrics, initMetrics, logger, type SessionPool } from '@webpilot/shared';
import type { TaskManager } from '../services/task-manager.js';
import { createTaskRouter } from './routes/task.routes.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error.middleware.js';
import { requestIdMiddleware } from './middleware/request-id.middleware.js';
import { gracefulShutdown, readyCheck } from '../shutdown/graceful-shutdown.js';

export interface AppDependencies {
    tasks: TaskManager;
    pool: SessionPool;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();

    initMetrics();

    app.use(express.json({ limit: '100kb' }));
    app.use(requestIdMiddleware);

    // Ready check (503 during shutdown)
    app.use(readyCheck);

    /**
     * Health Check Endpoint
     */
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            sessionPool: deps.pool.getStats(),
            tasks: deps.tasks.getStats()
        });
    });

    /**
     * Metrics Endpoint (Prometheus-compatible)
     */
    app.get('/metrics', async (_req: Request, res: Response) => {
        try {
            const metrics = await getMetrics();
            res.set('Content-Type', 'text/plain');
            res.send(metrics);
        } catch (error) {
            logger.error({ err: error }, 'Failed to get metrics');
            res.status(500).send('Error generating metrics');
        }
    });

    app.use('/api/v1/tasks', createTaskRouter(deps.tasks));

    // 404 handler (after all routes)
    app.use(notFoundHandler);

    // Global error handler (must be last)
    app.use(globalErrorHandler);

    return app;
}

/**
 * Start API Server
 */
export function startAPI(deps: AppDependencies, port: number, onShutdown: () => Promise<void>): Server {
    const app = createApp(deps);

    const server = app.listen(port, () => {
        logger.info(`🌐 API server listening on port ${port}`);
        logger.info(`   Tasks: http://localhost:${port}/api/v1/tasks`);
        logger.info(`   Health: http://localhost:${port}/health`);
        logger.info(`   Metrics: http://localhost:${port}/metrics`);
    });

    gracefulShutdown.setServer(server);
    gracefulShutdown.registerHooks({
        onShutdown,
        afterShutdown: async () => {
            logger.info('Cleanup complete');
        }
    });
    gracefulShutdown.init();

    return server;
}
