import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export const contextStorage = new AsyncLocalStorage<Map<string, string>>();

const CONTEXT_KEYS = ['correlationId', 'requestId', 'taskId', 'site'] as const;

const logger = pino({
    name: 'webpilot',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    redact: {
        paths: [
            'authorization',
            'cookie',
            'headers.authorization',
            'headers.cookie',
            'password',
            'apiKey',
            'api_key',
            'secret',
            'token',
            'OPENAI_API_KEY',
            '*.apiKey',
            '*.password',
            '*.secret',
            '*.token'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Record<string, string> = {};

        // Auto-inject request and task identifiers
        if (store) {
            for (const key of CONTEXT_KEYS) {
                const value = store.get(key);
                if (value) {
                    context[key] = value;
                }
            }
        }

        return context;
    }
});

/**
 * Run `fn` with extra keys merged into the logging context.
 */
export function withLogContext<T>(values: Record<string, string>, fn: () => T): T {
    const parent = contextStorage.getStore();
    const store = new Map<string, string>(parent ?? []);
    for (const [key, value] of Object.entries(values)) {
        store.set(key, value);
    }
    return contextStorage.run(store, fn);
}

export default logger;
