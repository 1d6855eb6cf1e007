/**
 * Time and randomness seams. Everything that waits or jitters goes through these
 * so tests can drive them deterministically.
 */

export interface Clock {
    now(): number;
    /** Resolves after `ms`, or early once `signal` aborts */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Uniform in [0, 1) */
export type RandomSource = () => number;

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number, signal?: AbortSignal) => sleep(ms, signal)
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export class TimeoutError extends Error {
    constructor(public readonly timeoutMs: number, label = 'Operation') {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Race `promise` against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label?: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), Math.max(0, timeoutMs));
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Integer uniformly drawn from [min, max]
 */
export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
    if (max <= min) {
        return min;
    }
    return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(items: readonly [T, ...T[]], random: RandomSource = Math.random): T {
    const index = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[index] ?? items[0];
}
