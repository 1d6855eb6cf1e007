import {
    ExecutionEngine,
    IntentClassifier,
    PlaywrightDriver,
    ResultExtractor,
    SelectorResolver,
    SessionPool,
    SiteCatalog,
    Tokens,
    container,
    createEnrichmentProvider,
    createEvasionService,
    createToken,
    logger,
    planCompiler,
    type Environment,
    type ServiceContainer
} from '@webpilot/shared';
import { TaskManager } from '../services/task-manager.js';

export const CoreTokens = {
    TaskManager: createToken<TaskManager>('TaskManager')
} as const;

/**
 * Register every engine service. Registration order is the reverse of disposal order,
 * so the task manager stops before the pool it draws sessions from.
 */
export function bootstrapDI(env: Environment, target: ServiceContainer = container): void {
    logger.info('🔧 Registering services in DI container...');

    target.register(Tokens.Config, env);

    // Automation
    target.registerFactory(Tokens.SiteCatalog, () => SiteCatalog.fromFile(), 'singleton');
    target.registerFactory(Tokens.IntentClassifier, () => IntentClassifier.fromFile(), 'singleton');
    target.register(Tokens.PlanCompiler, planCompiler);
    target.registerFactory(Tokens.SelectorResolver, () => new SelectorResolver(), 'singleton');
    target.registerFactory(Tokens.ResultExtractor, () => new ResultExtractor({
        minTemplateRecords: env.MIN_TEMPLATE_RECORDS,
        fallbackMinTextLength: env.FALLBACK_MIN_TEXT_LENGTH,
        maxRecords: env.MAX_RECORDS
    }), 'singleton');

    // Browser
    target.registerFactory(Tokens.EvasionService, () => createEvasionService({
        stepDelayMinMs: env.STEP_DELAY_MIN_MS,
        stepDelayMaxMs: env.STEP_DELAY_MAX_MS
    }), 'singleton');
    target.registerFactory(Tokens.BrowserDriver, () => new PlaywrightDriver({
        headless: env.HEADLESS,
        wsEndpoint: env.BROWSER_WS_ENDPOINT || undefined
    }), 'singleton');
    target.registerFactory(Tokens.SessionPool, c => new SessionPool(
        c.resolve(Tokens.BrowserDriver),
        c.resolve(Tokens.EvasionService),
        { maxSessions: env.POOL_SIZE }
    ), 'singleton');

    // AI
    target.registerFactory(Tokens.EnrichmentProvider, () => createEnrichmentProvider({
        enabled: env.ENABLE_LLM_ENRICHMENT,
        apiKey: env.OPENAI_API_KEY || undefined,
        model: env.OPENAI_MODEL,
        timeoutMs: env.ENRICHMENT_TIMEOUT_MS
    }), 'singleton');

    target.registerFactory(Tokens.ExecutionEngine, c => new ExecutionEngine(
        c.resolve(Tokens.SelectorResolver),
        c.resolve(Tokens.ResultExtractor),
        c.resolve(Tokens.EvasionService),
        {
            resolveTimeoutMs: env.RESOLVE_TIMEOUT_MS,
            navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
            maxRecords: env.MAX_RECORDS
        }
    ), 'singleton');

    target.registerFactory(CoreTokens.TaskManager, c => new TaskManager({
        classifier: c.resolve(Tokens.IntentClassifier),
        catalog: c.resolve(Tokens.SiteCatalog),
        compiler: c.resolve(Tokens.PlanCompiler),
        engine: c.resolve(Tokens.ExecutionEngine),
        pool: c.resolve(Tokens.SessionPool),
        enrichment: c.resolve(Tokens.EnrichmentProvider)
    }, {
        taskTimeoutMs: env.TASK_TIMEOUT_MS,
        retentionMs: env.TASK_RETENTION_MS
    }), 'singleton');

    logger.debug(`Registered services: ${target.getRegisteredServices().join(', ')}`);
}
