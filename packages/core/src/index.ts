// Loads .env before the shared logger reads LOG_LEVEL
import 'dotenv/config';
import { Tokens, container, errorMessage, logger, validateEnvironment } from '@webpilot/shared';
import { CoreTokens, bootstrapDI } from './di/bootstrap.js';
import { startAPI } from './api/server.js';

/**
 * Automation engine entry point: validate config, wire services, serve the task API.
 */
async function main(): Promise<void> {
    logger.info('🚀 Starting automation engine...');
    const env = validateEnvironment();

    bootstrapDI(env);

    // Resolve eagerly so a bad catalog or rules file fails startup, not the first task
    container.resolve(Tokens.SiteCatalog);
    container.resolve(Tokens.IntentClassifier);

    const tasks = container.resolve(CoreTokens.TaskManager);
    const pool = container.resolve(Tokens.SessionPool);
    tasks.startSweeper();

    startAPI({ tasks, pool }, env.PORT, async () => {
        logger.info('Stopping tasks and browser sessions...');
        await container.dispose();
    });

    logger.info(`✅ Engine started (${env.NODE_ENV}, pool size ${env.POOL_SIZE})`);
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, `💥 Fatal error: ${errorMessage(error)}`);
    process.exit(1);
});
