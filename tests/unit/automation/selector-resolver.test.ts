import { describe, it, expect } from 'vitest';
import { SelectorResolver, SessionFailure, type ElementRef } from '@webpilot/shared';
import { FakeSession, InstantClock } from '../../utils/fake-browser.js';

class HangingSession extends FakeSession {
    waitFor(): Promise<ElementRef | null> {
        return new Promise(() => undefined);
    }
}

class ThrowingSession extends FakeSession {
    constructor(private readonly failure: Error) {
        super('throwing', { pages: {} });
    }

    async waitFor(): Promise<ElementRef | null> {
        throw this.failure;
    }
}

async function sessionWith(html: string): Promise<FakeSession> {
    const session = new FakeSession('s1', { pages: { 'https://site.test/': { html } } });
    await session.navigate('https://site.test/');
    return session;
}

describe('SelectorResolver', () => {
    it('returns the first visible, enabled candidate', async () => {
        const clock = new InstantClock();
        const resolver = new SelectorResolver(clock);
        const session = await sessionWith('<button class="off" disabled>x</button><button id="ok">go</button>');

        const resolution = await resolver.resolve('submit', { submit: ['#missing', '.off', '#ok'] }, session, 1000);

        expect(resolution.found).toBe(true);
        if (resolution.found) {
            expect(resolution.selector).toBe('#ok');
            expect(resolution.element).toEqual({ selector: '#ok' });
        }
        expect(resolution.attempts.map(attempt => attempt.result)).toEqual(['missing', 'not-interactable', 'resolved']);
        expect(resolution.elapsedMs).toBe(0);
    });

    it('treats elements inside hidden subtrees as not interactable', async () => {
        const resolver = new SelectorResolver(new InstantClock());
        const session = await sessionWith('<div hidden><input id="q"></div>');

        const resolution = await resolver.resolve('searchInput', { searchInput: ['#q'] }, session, 500);

        expect(resolution.found).toBe(false);
        expect(resolution.attempts).toEqual([{ selector: '#q', result: 'not-interactable', elapsedMs: 0 }]);
    });

    it('reports an unknown role as not found without probing', async () => {
        const resolver = new SelectorResolver(new InstantClock());
        const resolution = await resolver.resolve('nothing', {}, await sessionWith('<p></p>'), 500);
        expect(resolution).toEqual({ found: false, role: 'nothing', attempts: [], elapsedMs: 0 });
    });

    it('splits the budget evenly across hanging candidates', async () => {
        const clock = new InstantClock();
        const resolver = new SelectorResolver(clock);
        const session = new HangingSession('h', { pages: {} });

        const resolution = await resolver.resolve('role', { role: ['.a', '.b', '.c', '.d'] }, session, 100);

        expect(resolution.found).toBe(false);
        expect(resolution.attempts).toEqual([
            { selector: '.a', result: 'timeout', elapsedMs: 25 },
            { selector: '.b', result: 'timeout', elapsedMs: 25 },
            { selector: '.c', result: 'timeout', elapsedMs: 25 },
            { selector: '.d', result: 'timeout', elapsedMs: 25 }
        ]);
        expect(resolution.elapsedMs).toBe(100);
    });

    it('marks candidates it had no time left for as budget-exhausted', async () => {
        const resolver = new SelectorResolver(new InstantClock());
        const session = new HangingSession('h', { pages: {} });

        const resolution = await resolver.resolve('role', { role: ['.a', '.b', '.c', '.d'] }, session, 2);

        expect(resolution.attempts.map(attempt => attempt.result)).toEqual([
            'timeout', 'timeout', 'budget-exhausted', 'budget-exhausted'
        ]);
        expect(resolution.elapsedMs).toBe(2);
    });

    it('never exceeds the budget', async () => {
        for (const budget of [1, 7, 50, 333]) {
            for (const count of [1, 2, 3, 5, 8]) {
                const resolver = new SelectorResolver(new InstantClock());
                const selectors = { role: Array.from({ length: count }, (_, i) => `.c${i}`) };

                const resolution = await resolver.resolve('role', selectors, new HangingSession('h', { pages: {} }), budget);

                expect(resolution.elapsedMs).toBeLessThanOrEqual(budget);
                expect(resolution.attempts).toHaveLength(count);
            }
        }
    });

    it('records a failing probe and moves on', async () => {
        const resolver = new SelectorResolver(new InstantClock());
        const resolution = await resolver.resolve('role', { role: ['.a'] }, new ThrowingSession(new Error('bad selector')), 100);
        expect(resolution.attempts).toEqual([{ selector: '.a', result: 'error', elapsedMs: 0 }]);
    });

    it('propagates a lost session', async () => {
        const resolver = new SelectorResolver(new InstantClock());
        const lost = new ThrowingSession(new SessionFailure('Target page, context or browser has been closed'));
        await expect(resolver.resolve('role', { role: ['.a'] }, lost, 100)).rejects.toBeInstanceOf(SessionFailure);
    });
});
