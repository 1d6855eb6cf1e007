import { z } from 'zod';
import logger from './logger.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Environment validation schema.
 * Validates every engine setting at startup and fails fast on bad values.
 */

// Helper validators
const portValidator = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: portValidator.default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // ==========================================
    // Task Execution
    // ==========================================
    POOL_SIZE: positiveInt.default(3),
    TASK_TIMEOUT_MS: positiveInt.default(120000),
    RESOLVE_TIMEOUT_MS: positiveInt.default(8000),
    NAVIGATION_TIMEOUT_MS: positiveInt.default(30000),
    TASK_RETENTION_MS: positiveInt.default(60 * 60 * 1000),

    // ==========================================
    // Anti-detection pacing
    // ==========================================
    STEP_DELAY_MIN_MS: nonNegativeInt.default(400),
    STEP_DELAY_MAX_MS: nonNegativeInt.default(1500),

    // ==========================================
    // Extraction
    // ==========================================
    MIN_TEMPLATE_RECORDS: positiveInt.default(3),
    FALLBACK_MIN_TEXT_LENGTH: positiveInt.default(12),
    MAX_RECORDS: positiveInt.default(10),

    // ==========================================
    // Browser
    // ==========================================
    HEADLESS: booleanFlag.default('true'),
    BROWSER_WS_ENDPOINT: z.string().url().optional().or(z.literal('')),

    // ==========================================
    // Optional LLM enrichment
    // ==========================================
    ENABLE_LLM_ENRICHMENT: booleanFlag.default('false'),
    OPENAI_API_KEY: z.string().optional().or(z.literal('')),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    ENRICHMENT_TIMEOUT_MS: positiveInt.default(8000),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let validatedEnv: Environment | null = null;

/**
 * Parse and check a set of variables. Throws ConfigurationError listing every bad key.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Environment {
    const parsed = EnvironmentSchema.safeParse(source);

    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError(
            `Invalid configuration: ${issues.map(i => i.field).join(', ')}`,
            { issues }
        );
    }

    validateBusinessRules(parsed.data);
    return parsed.data;
}

/**
 * Cross-field rules the schema cannot express
 */
function validateBusinessRules(env: Environment): void {
    if (env.STEP_DELAY_MIN_MS > env.STEP_DELAY_MAX_MS) {
        throw new ConfigurationError('STEP_DELAY_MIN_MS must not exceed STEP_DELAY_MAX_MS', {
            min: env.STEP_DELAY_MIN_MS,
            max: env.STEP_DELAY_MAX_MS
        });
    }

    if (env.ENABLE_LLM_ENRICHMENT && !env.OPENAI_API_KEY) {
        logger.warn(
            '⚠️  LLM enrichment is enabled but OPENAI_API_KEY is not set. ' +
            'Plans will use rule-based templates only.'
        );
    }
}

/**
 * Validate environment variables on startup.
 * Exits the process when the configuration is unusable.
 */
export function validateEnvironment(): Environment {
    try {
        validatedEnv = loadConfig(process.env);

        logger.info('✅ Environment validation passed');
        logger.info(`📦 Running in ${validatedEnv.NODE_ENV} mode`);

        return validatedEnv;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('❌ ENVIRONMENT VALIDATION FAILED\n');
            console.error(`${error.message}\n`);
            console.error('📖 See .env.example for the supported variables.\n');
        } else {
            console.error('❌ ENVIRONMENT VALIDATION FAILED:', error);
        }

        process.exit(1);
    }
}

/**
 * Get validated environment (must call validateEnvironment() first)
 */
export function getEnv(): Environment {
    if (!validatedEnv) {
        throw new ConfigurationError(
            'Environment not validated yet. Call validateEnvironment() at application startup.'
        );
    }
    return validatedEnv;
}
