import { describe, it, expect } from 'vitest';
import { CircuitBreaker, CircuitOpenError, CircuitState } from '@webpilot/shared';

const fail = async (): Promise<string> => {
    throw new Error('upstream down');
};
const succeed = async (): Promise<string> => 'ok';

describe('CircuitBreaker', () => {
    it('opens after the failure threshold and blocks calls', async () => {
        const breaker = new CircuitBreaker('test', { failureThreshold: 2, cooldownMs: 1000, now: () => 0 });

        await expect(breaker.execute(fail)).rejects.toThrow('upstream down');
        expect(breaker.getState()).toBe(CircuitState.CLOSED);
        await expect(breaker.execute(fail)).rejects.toThrow('upstream down');
        expect(breaker.getState()).toBe(CircuitState.OPEN);

        await expect(breaker.execute(succeed)).rejects.toBeInstanceOf(CircuitOpenError);
    });

    it('resets the failure count on success while closed', async () => {
        const breaker = new CircuitBreaker('test', { failureThreshold: 2, now: () => 0 });

        await expect(breaker.execute(fail)).rejects.toThrow();
        await breaker.execute(succeed);
        await expect(breaker.execute(fail)).rejects.toThrow();

        expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('closes again after enough trial successes once the cooldown passes', async () => {
        let now = 0;
        const breaker = new CircuitBreaker('test', { failureThreshold: 1, cooldownMs: 1000, successThreshold: 2, now: () => now });
        await expect(breaker.execute(fail)).rejects.toThrow();

        now = 1000;
        await expect(breaker.execute(succeed)).resolves.toBe('ok');
        expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
        await breaker.execute(succeed);

        expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('reopens when a trial call fails', async () => {
        let now = 0;
        const breaker = new CircuitBreaker('test', { failureThreshold: 1, cooldownMs: 1000, now: () => now });
        await expect(breaker.execute(fail)).rejects.toThrow();

        now = 1500;
        await expect(breaker.execute(fail)).rejects.toThrow('upstream down');

        expect(breaker.getState()).toBe(CircuitState.OPEN);
        await expect(breaker.execute(succeed)).rejects.toBeInstanceOf(CircuitOpenError);
    });

    it('uses the fallback while open', async () => {
        const breaker = new CircuitBreaker('test', { failureThreshold: 1, cooldownMs: 1000, now: () => 0 });
        await expect(breaker.execute(fail)).rejects.toThrow();

        await expect(breaker.execute(succeed, async () => 'cached')).resolves.toBe('cached');
    });
});
