import logger from './logger.js';

export enum CircuitState {
    CLOSED,   // Normal operation
    OPEN,     // Failing, reject calls
    HALF_OPEN // Testing recovery
}

export interface CircuitBreakerOptions {
    failureThreshold: number; // Consecutive failures before opening
    cooldownMs: number;       // Time to wait before a trial call (Half-Open)
    successThreshold: number; // Trial successes needed to close
    now: () => number;
}

export class CircuitOpenError extends Error {
    constructor(public readonly circuit: string) {
        super(`Circuit Breaker '${circuit}' is OPEN. Calls blocked.`);
        this.name = 'CircuitOpenError';
    }
}

/**
 * Guards a flaky collaborator. Used around enrichment calls so a failing model
 * stops costing task time after a few misses.
 */
export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private failureCount = 0;
    private successCount = 0;
    private nextAttempt = 0;
    private readonly name: string;
    private readonly options: CircuitBreakerOptions;

    constructor(name: string, options: Partial<CircuitBreakerOptions> = {}) {
        this.name = name;
        this.options = {
            failureThreshold: options.failureThreshold ?? 5,
            cooldownMs: options.cooldownMs ?? 30000,
            successThreshold: options.successThreshold ?? 2,
            now: options.now ?? Date.now
        };
    }

    getState(): CircuitState {
        return this.state;
    }

    /**
     * Execute a function with circuit breaker protection
     */
    async execute<T>(fn: () => Promise<T>, fallback?: () => Promise<T>): Promise<T> {
        if (this.state === CircuitState.OPEN) {
            if (this.options.now() >= this.nextAttempt) {
                this.transitionTo(CircuitState.HALF_OPEN);
            } else {
                if (fallback) {
                    return fallback();
                }
                throw new CircuitOpenError(this.name);
            }
        }

        try {
            const result = await fn();
            this.onSuccess();
            return result;
        } catch (error) {
            this.onFailure(error);
            if (fallback) {
                return fallback();
            }
            throw error;
        }
    }

    private onSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.successCount++;
            if (this.successCount >= this.options.successThreshold) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            this.failureCount = 0;
        }
    }

    private onFailure(error: unknown): void {
        this.failureCount++;
        logger.warn({ err: error, circuit: this.name, state: CircuitState[this.state] }, 'Circuit breaker recorded failure');

        if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
            this.transitionTo(CircuitState.OPEN);
        } else if (this.state === CircuitState.HALF_OPEN) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(newState: CircuitState): void {
        logger.info({ circuit: this.name, from: CircuitState[this.state], to: CircuitState[newState] }, 'Circuit state changed');
        this.state = newState;

        if (newState === CircuitState.OPEN) {
            this.nextAttempt = this.options.now() + this.options.cooldownMs;
        } else if (newState === CircuitState.CLOSED) {
            this.failureCount = 0;
            this.successCount = 0;
        } else {
            this.successCount = 0;
        }
    }
}
