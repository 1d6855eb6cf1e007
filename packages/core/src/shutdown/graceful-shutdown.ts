import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { errorResponse, logger } from '@webpilot/shared';

export interface ShutdownHooks {
    onShutdown?: () => Promise<void>;
    afterShutdown?: () => Promise<void>;
}

/**
 * Ordered process teardown: stop taking requests, close the server, run the engine's
 * cleanup, exit. A second signal or the hard timeout forces exit.
 */
export class GracefulShutdown {
    private isShuttingDown = false;
    private server: Server | null = null;
    private hooks: ShutdownHooks = {};

    // Long enough for running tasks to observe cancellation and close their sessions
    constructor(private readonly shutdownTimeout = 30000) { }

    setServer(server: Server): void {
        this.server = server;
    }

    /**
     * Register shutdown hooks
     */
    registerHooks(hooks: ShutdownHooks): void {
        this.hooks = { ...this.hooks, ...hooks };
    }

    /**
     * Initialize graceful shutdown handlers
     */
    init(): void {
        // Handle termination signals
        process.on('SIGTERM', () => void this.handleShutdown('SIGTERM'));
        process.on('SIGINT', () => void this.handleShutdown('SIGINT'));

        process.on('uncaughtException', (error) => {
            logger.error({ err: error }, 'Uncaught exception');
            void this.handleShutdown('uncaughtException');
        });

        process.on('unhandledRejection', (reason) => {
            logger.error({ reason }, 'Unhandled promise rejection');
            void this.handleShutdown('unhandledRejection');
        });

        logger.info('Graceful shutdown handlers initialized');
    }

    /**
     * Handle shutdown process
     */
    private async handleShutdown(signal: string): Promise<void> {
        if (this.isShuttingDown) {
            logger.warn('Shutdown already in progress, forcing exit...');
            process.exit(1);
        }

        this.isShuttingDown = true;
        logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

        // Set a hard timeout
        const forceExitTimeout = setTimeout(() => {
            logger.error('Graceful shutdown timeout exceeded, forcing exit');
            process.exit(1);
        }, this.shutdownTimeout);

        try {
            // New requests already get 503 from readyCheck
            if (this.server) {
                logger.info('Stopping HTTP server from accepting new connections');
                await this.closeServer();
            }

            // Cancel tasks, close sessions and the browser
            if (this.hooks.onShutdown) {
                logger.info('Running shutdown hooks');
                await this.hooks.onShutdown();
            }

            if (this.hooks.afterShutdown) {
                logger.info('Running after-shutdown hooks');
                await this.hooks.afterShutdown();
            }

            clearTimeout(forceExitTimeout);

            logger.info('Graceful shutdown completed successfully');
            process.exit(0);
        } catch (error: unknown) {
            logger.error({ err: error }, 'Error during graceful shutdown');
            clearTimeout(forceExitTimeout);
            process.exit(1);
        }
    }

    /**
     * Close HTTP server gracefully
     */
    private closeServer(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) {
                return resolve();
            }

            this.server.close((err: Error | undefined) => {
                if (err) {
                    logger.error({ err }, 'Error closing HTTP server');
                    reject(err);
                } else {
                    logger.info('HTTP server closed successfully');
                    resolve();
                }
            });
        });
    }

    /**
     * Check if shutdown is in progress
     */
    isInProgress(): boolean {
        return this.isShuttingDown;
    }
}

// Singleton instance
export const gracefulShutdown = new GracefulShutdown();

/**
 * Ready check middleware - returns 503 during shutdown
 */
export function readyCheck(req: Request, res: Response, next: NextFunction): void {
    if (gracefulShutdown.isInProgress()) {
        res.status(503).json(errorResponse('SHUTTING_DOWN', 'Server is shutting down', undefined, req.id));
        return;
    }
    next();
}
