import type { ElementRef, IBrowserSession } from '../types/browser.interface.js';
import type { ProbeResult, ResolutionAttempt, SelectorSet } from '../types/automation.interface.js';
import { SessionFailure } from '../types/errors.js';
import { selectorResolutionSeconds } from '../observability/metrics.js';
import { systemClock, type Clock } from '../utils/timing.js';
import logger from '../utils/logger.js';

export type Resolution =
    | { found: true; role: string; selector: string; element: ElementRef; attempts: ResolutionAttempt[]; elapsedMs: number }
    | { found: false; role: string; attempts: ResolutionAttempt[]; elapsedMs: number };

type ProbeOutcome =
    | { result: 'resolved'; element: ElementRef }
    | { result: Exclude<ProbeResult, 'resolved' | 'budget-exhausted'> };

const TIMED_OUT: ProbeOutcome = { result: 'timeout' };

/**
 * Ranked candidate exhaustion under a fixed wall-clock budget.
 *
 * Each candidate gets `remaining / candidatesLeft` of the budget and is raced against
 * that slice, so the total for a role never exceeds the budget. A candidate only counts
 * when its element is visible and enabled.
 */
export class SelectorResolver {
    constructor(private readonly clock: Clock = systemClock) { }

    async resolve(role: string, selectors: SelectorSet, session: IBrowserSession, budgetMs: number): Promise<Resolution> {
        const candidates = selectors[role] ?? [];
        const started = this.clock.now();
        const deadline = started + Math.max(0, budgetMs);
        const attempts: ResolutionAttempt[] = [];

        for (const [i, selector] of candidates.entries()) {
            const remaining = deadline - this.clock.now();

            if (remaining <= 0) {
                for (const skipped of candidates.slice(i)) {
                    attempts.push({ selector: skipped, result: 'budget-exhausted', elapsedMs: 0 });
                }
                break;
            }

            const slice = Math.max(1, Math.floor(remaining / (candidates.length - i)));
            const probeStart = this.clock.now();
            const outcome = await this.probe(session, selector, slice);
            attempts.push({ selector, result: outcome.result, elapsedMs: this.clock.now() - probeStart });

            if (outcome.result === 'resolved') {
                return this.finish({
                    found: true,
                    role,
                    selector,
                    element: outcome.element,
                    attempts,
                    elapsedMs: this.clock.now() - started
                });
            }
        }

        return this.finish({ found: false, role, attempts, elapsedMs: this.clock.now() - started });
    }

    private finish(resolution: Resolution): Resolution {
        selectorResolutionSeconds.observe({ found: String(resolution.found) }, resolution.elapsedMs / 1000);
        logger.debug({
            role: resolution.role,
            found: resolution.found,
            attempts: resolution.attempts.length,
            elapsedMs: resolution.elapsedMs
        }, 'Role resolution finished');
        return resolution;
    }

    private async probe(session: IBrowserSession, selector: string, sliceMs: number): Promise<ProbeOutcome> {
        const timer = new AbortController();
        const lookup = this.lookup(session, selector, sliceMs);
        const expiry = this.clock.sleep(sliceMs, timer.signal).then(() => TIMED_OUT);

        try {
            return await Promise.race([lookup, expiry]);
        } finally {
            timer.abort();
            // A lookup that lost the race may still settle; its result is irrelevant
            void lookup.catch(error => logger.debug({ err: error, selector }, 'Late probe failure ignored'));
        }
    }

    private async lookup(session: IBrowserSession, selector: string, sliceMs: number): Promise<ProbeOutcome> {
        try {
            const element = await session.waitFor(selector, sliceMs);
            if (!element) {
                return { result: 'missing' };
            }
            return (await session.isInteractable(element))
                ? { result: 'resolved', element }
                : { result: 'not-interactable' };
        } catch (error) {
            if (error instanceof SessionFailure) {
                throw error;
            }
            logger.debug({ err: error, selector }, 'Candidate probe failed');
            return { result: 'error' };
        }
    }
}
