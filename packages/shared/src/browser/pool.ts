import type { IBrowserDriver, IBrowserSession } from '../types/browser.interface.js';
import type { BrowserFingerprint } from './fingerprint-generator.js';
import type { EvasionService } from '../services/evasion.service.js';
import { FailurePoint, SessionFailure, errorMessage, isAppError } from '../types/errors.js';
import logger from '../utils/logger.js';

export interface SessionPoolOptions {
    maxSessions: number;
}

export interface SessionLease {
    session: IBrowserSession;
    fingerprint: BrowserFingerprint;
    /** Close the session and hand the slot to the next waiter. Safe to call more than once. */
    release(): Promise<void>;
}

export interface SessionPoolStats {
    maxSessions: number;
    active: number;
    waiting: number;
    opened: number;
    closed: number;
}

interface Waiter {
    grant: () => void;
    reject: (reason: unknown) => void;
}

export class AcquireAbortedError extends Error {
    constructor() {
        super('Session acquisition aborted while waiting for a free slot');
        this.name = 'AcquireAbortedError';
    }
}

/**
 * Bounded set of isolated browser sessions. Callers beyond the limit wait in FIFO order.
 * Sessions are never reused: every lease opens a fresh context and closes it on release.
 */
export class SessionPool {
    private active = 0;
    private opened = 0;
    private closed = 0;
    private readonly waiters: Waiter[] = [];

    constructor(
        private readonly driver: IBrowserDriver,
        private readonly evasion: EvasionService,
        private readonly options: SessionPoolOptions
    ) {
        logger.info(`🌐 SessionPool initialized with max ${options.maxSessions} sessions`);
    }

    /**
     * Wait for a slot, then open a session with a freshly drawn fingerprint.
     */
    async acquire(signal?: AbortSignal): Promise<SessionLease> {
        await this.takeSlot(signal);

        const profile = this.evasion.createProfile();
        let session: IBrowserSession;
        try {
            session = await this.driver.newSession(profile.options);
        } catch (error) {
            this.freeSlot();
            throw isAppError(error)
                ? error
                : new SessionFailure(`Failed to open browser session: ${errorMessage(error)}`, undefined, FailurePoint.SESSION_ACQUISITION);
        }
        this.opened++;

        let released = false;
        return {
            session,
            fingerprint: profile.fingerprint,
            release: async () => {
                if (released) {
                    return;
                }
                released = true;
                try {
                    await this.driver.close(session);
                } catch (error) {
                    logger.warn({ err: error, sessionId: session.id }, 'Failed to close session');
                } finally {
                    this.closed++;
                    this.freeSlot();
                }
            }
        };
    }

    getStats(): SessionPoolStats {
        return {
            maxSessions: this.options.maxSessions,
            active: this.active,
            waiting: this.waiters.length,
            opened: this.opened,
            closed: this.closed
        };
    }

    /**
     * Reject every waiter and close the driver
     */
    async dispose(): Promise<void> {
        const pending = this.waiters.splice(0);
        for (const waiter of pending) {
            waiter.reject(new SessionFailure('Session pool is shutting down', undefined, FailurePoint.SESSION_ACQUISITION));
        }
        await this.driver.shutdown();
        logger.info('SessionPool shut down');
    }

    private takeSlot(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(new AcquireAbortedError());
        }
        if (this.active < this.options.maxSessions) {
            this.active++;
            return Promise.resolve();
        }

        logger.debug({ active: this.active, waiting: this.waiters.length }, '🔒 Session pool full, queuing request...');

        return new Promise<void>((resolve, reject) => {
            const onAbort = (): void => {
                const index = this.waiters.indexOf(waiter);
                if (index !== -1) {
                    this.waiters.splice(index, 1);
                    reject(new AcquireAbortedError());
                }
            };
            const waiter: Waiter = {
                grant: () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                },
                reject: (reason: unknown) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(reason);
                }
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    private freeSlot(): void {
        const next = this.waiters.shift();
        if (next) {
            // Slot passes straight to the oldest waiter; active count is unchanged
            next.grant();
            return;
        }
        this.active = Math.max(0, this.active - 1);
    }
}
