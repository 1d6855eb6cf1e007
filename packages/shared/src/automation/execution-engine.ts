import type { IBrowserSession } from '../types/browser.interface.js';
import type {
    ExecutionPlan,
    ResultRecord,
    SiteDescriptor,
    Step,
    StepError,
    StepOutcome,
    TerminalStatus
} from '../types/automation.interface.js';
import {
    NavigationFailure,
    ResolutionFailure,
    SessionFailure,
    errorMessage,
    isAppError,
    toApplicationError
} from '../types/errors.js';
import type { EvasionService } from '../services/evasion.service.js';
import { stepOutcomesTotal } from '../observability/metrics.js';
import { systemClock, type Clock } from '../utils/timing.js';
import logger from '../utils/logger.js';
import type { SelectorResolver, Resolution } from './selector-resolver.js';
import { dedupeByUrl, type ResultExtractor } from './result-extractor.js';
import { deriveTaskStatus } from './task-status.js';

export interface ExecutionEngineOptions {
    resolveTimeoutMs: number;
    navigationTimeoutMs: number;
    maxRecords: number;
}

export interface ExecutionRequest {
    session: IBrowserSession;
    plan: ExecutionPlan;
    descriptor: SiteDescriptor;
    /** Aborting stops the run before the next step */
    signal?: AbortSignal;
    /** Called with each outcome as soon as it is recorded */
    onOutcome?: (outcome: StepOutcome) => void;
    /** Called with the merged result set after each extract that added records */
    onRecords?: (results: readonly ResultRecord[]) => void;
}

export interface ExecutionReport {
    status: TerminalStatus;
    outcomes: StepOutcome[];
    results: ResultRecord[];
    error?: StepError;
}

interface StepResult {
    outcome: StepOutcome;
    records?: ResultRecord[];
    /** Stop the plan here */
    abort?: boolean;
}

function toStepError(error: unknown): StepError {
    const appError = toApplicationError(error);
    return { code: appError.code, message: appError.message };
}

/**
 * Drives one session through a plan, strictly in order, recording one outcome per step.
 *
 * A failed navigate, a failed required step or a lost session aborts; the remaining
 * steps are recorded as skipped. Every other failure is recorded and the plan continues.
 */
export class ExecutionEngine {
    constructor(
        private readonly resolver: SelectorResolver,
        private readonly extractor: ResultExtractor,
        private readonly evasion: EvasionService,
        private readonly options: ExecutionEngineOptions,
        private readonly clock: Clock = systemClock
    ) { }

    async run(request: ExecutionRequest): Promise<ExecutionReport> {
        const { plan, signal } = request;
        const outcomes: StepOutcome[] = [];
        let results: ResultRecord[] = [];
        let fatal: StepError | undefined;

        const record = (outcome: StepOutcome): void => {
            outcomes.push(outcome);
            stepOutcomesTotal.inc({ action: outcome.action, status: outcome.status });
            request.onOutcome?.(outcome);
        };

        for (const step of plan.steps) {
            if (fatal || signal?.aborted) {
                record(this.skipped(step, fatal ? 'Aborted after an earlier fatal step' : 'Task cancelled'));
                continue;
            }

            if (step.index > 0) {
                await this.evasion.pauseBetweenSteps(signal);
                if (signal?.aborted) {
                    record(this.skipped(step, 'Task cancelled'));
                    continue;
                }
            }

            const result = await this.runStep(step, request);
            record(result.outcome);

            if (result.records && result.records.length > 0) {
                results = dedupeByUrl([...results, ...result.records]).slice(0, this.options.maxRecords);
                request.onRecords?.(results);
            }
            if (result.abort) {
                fatal = result.outcome.error ?? { code: 'STEP_FAILED', message: `Step ${step.index} failed` };
                logger.warn({ step: step.index, action: step.action, error: fatal }, 'Aborting plan');
            }
        }

        const report: ExecutionReport = { status: deriveTaskStatus(outcomes), outcomes, results };
        if (fatal) {
            report.error = fatal;
        }
        return report;
    }

    private async runStep(step: Step, request: ExecutionRequest): Promise<StepResult> {
        const started = this.clock.now();
        const base: Omit<StepOutcome, 'status' | 'elapsedMs'> = {
            index: step.index,
            action: step.action,
            required: step.required
        };
        if (step.role !== undefined) {
            base.role = step.role;
        }
        const elapsed = (): number => this.clock.now() - started;

        try {
            switch (step.action) {
                case 'navigate': {
                    await this.navigate(step, request);
                    return { outcome: { ...base, status: 'ok', elapsedMs: elapsed() } };
                }

                case 'type': {
                    const text = step.params.text ?? '';
                    if (text.trim() === '') {
                        return { outcome: { ...base, status: 'skipped', elapsedMs: elapsed(), error: { code: 'EMPTY_TEXT', message: 'Nothing to type' } } };
                    }
                    const resolution = await this.resolveRole(step, request);
                    if (!resolution.found) {
                        return this.unresolved(step, base, resolution, elapsed());
                    }
                    await request.session.type(resolution.element, text, this.evasion.typeOptions());
                    if (step.params.submit) {
                        await request.session.press(resolution.element, 'Enter');
                    }
                    return { outcome: this.resolvedOutcome(base, resolution, elapsed()) };
                }

                case 'click': {
                    const resolution = await this.resolveRole(step, request);
                    if (!resolution.found) {
                        return this.unresolved(step, base, resolution, elapsed());
                    }
                    const box = await request.session.boundingBox(resolution.element);
                    await request.session.click(resolution.element, this.evasion.clickOptions(box));
                    return { outcome: this.resolvedOutcome(base, resolution, elapsed()) };
                }

                case 'waitFor': {
                    if (!step.role) {
                        await this.clock.sleep(step.params.durationMs ?? 0, request.signal);
                        return { outcome: { ...base, status: 'ok', elapsedMs: elapsed() } };
                    }
                    const resolution = await this.resolveRole(step, request);
                    if (!resolution.found) {
                        return this.unresolved(step, base, resolution, elapsed());
                    }
                    return { outcome: this.resolvedOutcome(base, resolution, elapsed()) };
                }

                case 'scroll': {
                    if (!step.role) {
                        await request.session.scroll(null);
                        return { outcome: { ...base, status: 'ok', elapsedMs: elapsed() } };
                    }
                    const resolution = await this.resolveRole(step, request);
                    if (!resolution.found) {
                        return this.unresolved(step, base, resolution, elapsed());
                    }
                    await request.session.scroll(resolution.element);
                    return { outcome: this.resolvedOutcome(base, resolution, elapsed()) };
                }

                case 'extract': {
                    const extraction = await this.extractor.extract(request.session, request.descriptor, step.refinements);
                    if (extraction.failure instanceof SessionFailure) {
                        throw extraction.failure;
                    }
                    return {
                        outcome: {
                            ...base,
                            status: 'ok',
                            elapsedMs: elapsed(),
                            recordCount: extraction.records.length,
                            extractionMode: extraction.mode
                        },
                        records: extraction.records
                    };
                }
            }
        } catch (error) {
            const sessionLost = error instanceof SessionFailure || request.session.isClosed();
            const failure = sessionLost && !(error instanceof SessionFailure)
                ? new SessionFailure(`Browser session lost: ${errorMessage(error)}`)
                : error;

            logger.warn({ err: failure, step: step.index, action: step.action }, 'Step failed');
            return {
                outcome: { ...base, status: 'failed', elapsedMs: elapsed(), error: toStepError(failure) },
                abort: sessionLost || step.action === 'navigate' || step.required
            };
        }
    }

    private async navigate(step: Step, request: ExecutionRequest): Promise<void> {
        const url = step.params.url ?? request.descriptor.baseUrl;
        let status: number | null;
        try {
            ({ status } = await request.session.navigate(url, this.options.navigationTimeoutMs));
        } catch (error) {
            if (isAppError(error)) {
                throw error;
            }
            throw new NavigationFailure(url, errorMessage(error));
        }
        if (status !== null && (status < 200 || status >= 300)) {
            throw new NavigationFailure(url, `HTTP ${status}`, status);
        }
    }

    private resolveRole(step: Step, request: ExecutionRequest): Promise<Resolution> {
        const role = step.role ?? '';
        const budget = step.params.timeoutMs ?? this.options.resolveTimeoutMs;
        return this.resolver.resolve(role, request.descriptor.selectors, request.session, budget);
    }

    private resolvedOutcome(
        base: Omit<StepOutcome, 'status' | 'elapsedMs'>,
        resolution: Extract<Resolution, { found: true }>,
        elapsedMs: number
    ): StepOutcome {
        return {
            ...base,
            status: 'ok',
            selector: resolution.selector,
            candidatesTried: resolution.attempts.map(attempt => attempt.selector),
            attempts: resolution.attempts,
            elapsedMs
        };
    }

    private unresolved(
        step: Step,
        base: Omit<StepOutcome, 'status' | 'elapsedMs'>,
        resolution: Extract<Resolution, { found: false }>,
        elapsedMs: number
    ): StepResult {
        const candidatesTried = resolution.attempts.map(attempt => attempt.selector);
        const failure = new ResolutionFailure(step.role ?? '', candidatesTried, { step: step.index });
        return {
            outcome: {
                ...base,
                status: 'failed',
                candidatesTried,
                attempts: resolution.attempts,
                error: toStepError(failure),
                elapsedMs
            },
            abort: step.required
        };
    }

    private skipped(step: Step, reason: string): StepOutcome {
        const outcome: StepOutcome = {
            index: step.index,
            action: step.action,
            required: step.required,
            status: 'skipped',
            error: { code: 'SKIPPED', message: reason },
            elapsedMs: 0
        };
        if (step.role !== undefined) {
            outcome.role = step.role;
        }
        return outcome;
    }
}
