import { v4 as uuidv4 } from 'uuid';
import {
    NotFoundError,
    ShuttingDownError,
    TaskTimeoutError,
    activeTasks,
    errorMessage,
    logger,
    systemClock,
    taskDurationSeconds,
    tasksTotal,
    toApplicationError,
    withLogContext,
    type Clock,
    type ExecutionEngine,
    type ExtractRefinement,
    type IEnrichmentProvider,
    type IntentClassifier,
    type PlanCompiler,
    type ResultRecord,
    type SessionLease,
    type SessionPool,
    type SiteCatalog,
    type SiteDescriptor,
    type StepError,
    type TaskSnapshot,
    type TaskStatus,
    type TerminalStatus
} from '@webpilot/shared';
import { Task } from './task.js';

export interface TaskManagerDeps {
    classifier: IntentClassifier;
    catalog: SiteCatalog;
    compiler: PlanCompiler;
    engine: ExecutionEngine;
    pool: SessionPool;
    enrichment: IEnrichmentProvider;
    clock?: Clock;
}

export interface TaskManagerOptions {
    taskTimeoutMs: number;
    retentionMs: number;
    /** Defaults to a tenth of the retention window, at most one minute */
    sweepIntervalMs?: number;
}

export interface SubmitOptions {
    /** Absolute http(s) page that replaces the first navigate target */
    startUrl?: string;
}

export interface ListOptions {
    limit: number;
    status?: TaskStatus;
}

const TIMED_OUT = Symbol('timed-out');

interface Running {
    controller: AbortController;
    done: Promise<void>;
}

/**
 * Accepts goals, runs each as an independent task and answers status polls.
 *
 * Every task gets its own session from the pool and a wall-clock ceiling. On expiry the
 * task is failed, its session closed and anything the run reports afterwards is dropped.
 */
export class TaskManager {
    private readonly tasks = new Map<string, Task>();
    private readonly running = new Map<string, Running>();
    private readonly clock: Clock;
    private sweepTimer: NodeJS.Timeout | null = null;
    private disposed = false;

    constructor(
        private readonly deps: TaskManagerDeps,
        private readonly options: TaskManagerOptions
    ) {
        this.clock = deps.clock ?? systemClock;
    }

    /**
     * Classify, compile and start a task. Returns the pending snapshot at once.
     */
    submit(goalText: string, options: SubmitOptions = {}): TaskSnapshot {
        if (this.disposed) {
            throw new ShuttingDownError('Task manager');
        }

        const now = new Date(this.clock.now());
        const { category, queryTerms } = this.deps.classifier.classify(goalText);
        const descriptor = this.deps.catalog.get(category);
        const plan = this.deps.compiler.compile(category, queryTerms, descriptor, { startUrl: options.startUrl });

        const task = new Task({
            id: uuidv4(),
            goal: { text: goalText, submittedAt: now },
            category,
            plan,
            createdAt: now
        });
        this.tasks.set(task.id, task);

        logger.info({
            taskId: task.id,
            category,
            site: descriptor.name,
            queryTerms,
            startUrl: options.startUrl
        }, '📥 Task accepted');

        const controller = new AbortController();
        const done = withLogContext({ taskId: task.id, site: descriptor.name }, () =>
            this.execute(task, descriptor, controller)
        ).finally(() => this.running.delete(task.id));
        this.running.set(task.id, { controller, done });

        return task.toSnapshot();
    }

    get(id: string): TaskSnapshot {
        const task = this.tasks.get(id);
        if (!task) {
            throw new NotFoundError('Task', id);
        }
        return task.toSnapshot();
    }

    /**
     * Newest first
     */
    list(options: ListOptions): TaskSnapshot[] {
        const matching = Array.from(this.tasks.values())
            .filter(task => !options.status || task.status === options.status)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
        return matching.slice(0, options.limit).map(task => task.toSnapshot());
    }

    /**
     * Resolves once the task has a terminal status.
     */
    async waitFor(id: string): Promise<TaskSnapshot> {
        const current = this.get(id);
        await this.running.get(id)?.done;
        return this.tasks.get(id)?.toSnapshot() ?? current;
    }

    getStats(): Record<TaskStatus, number> {
        const stats: Record<TaskStatus, number> = {
            pending: 0,
            running: 0,
            succeeded: 0,
            partially_succeeded: 0,
            failed: 0
        };
        for (const task of this.tasks.values()) {
            stats[task.status]++;
        }
        return stats;
    }

    /**
     * Evict terminal tasks that finished more than the retention window ago.
     */
    sweep(): number {
        const cutoff = this.clock.now() - this.options.retentionMs;
        let evicted = 0;
        for (const [id, task] of this.tasks) {
            const finishedAt = task.finishedAtMs;
            if (task.isTerminal() && finishedAt !== undefined && finishedAt <= cutoff) {
                this.tasks.delete(id);
                evicted++;
            }
        }
        if (evicted > 0) {
            logger.debug({ evicted, remaining: this.tasks.size }, '🧹 Retention sweep evicted tasks');
        }
        return evicted;
    }

    startSweeper(): void {
        if (this.sweepTimer) {
            return;
        }
        const interval = this.options.sweepIntervalMs ?? Math.min(60000, Math.max(1000, Math.floor(this.options.retentionMs / 10)));
        this.sweepTimer = setInterval(() => this.sweep(), interval);
        this.sweepTimer.unref();
    }

    /**
     * Cancel every running task and wait for each to settle.
     */
    async dispose(): Promise<void> {
        this.disposed = true;
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }

        const inflight = Array.from(this.running.values());
        for (const { controller } of inflight) {
            controller.abort();
        }
        await Promise.allSettled(inflight.map(entry => entry.done));
        logger.info({ cancelled: inflight.length }, 'Task manager stopped');
    }

    private async execute(task: Task, descriptor: SiteDescriptor, controller: AbortController): Promise<void> {
        const held: { lease?: SessionLease } = {};
        const deadline = new AbortController();
        // A driver call blocked on the page only returns once its session is closed
        controller.signal.addEventListener('abort', () => {
            void held.lease?.release();
        }, { once: true });

        const pipeline = this.pipeline(task, descriptor, controller.signal, held);
        const expiry = this.clock.sleep(this.options.taskTimeoutMs, deadline.signal).then(() => TIMED_OUT);

        const winner = await Promise.race([pipeline, expiry]);
        deadline.abort();

        if (winner !== TIMED_OUT) {
            return;
        }

        const timeout = new TaskTimeoutError(task.id, this.options.taskTimeoutMs);
        logger.warn({ timeoutMs: this.options.taskTimeoutMs }, '⏱️ Task exceeded its ceiling; closing session');
        // Records extracted before expiry stay on the task
        this.complete(task, 'failed', undefined, { code: timeout.code, message: timeout.message });
        controller.abort();
        await held.lease?.release();
        // Late step results are dropped by the terminal task
        await pipeline;
    }

    /**
     * Never rejects: every failure ends up as the task's terminal status.
     */
    private async pipeline(
        task: Task,
        descriptor: SiteDescriptor,
        signal: AbortSignal,
        held: { lease?: SessionLease }
    ): Promise<void> {
        try {
            await this.applyEnrichment(task);

            held.lease = await this.deps.pool.acquire(signal);
            if (signal.aborted || !task.start(new Date(this.clock.now()))) {
                this.complete(task, 'failed', undefined, { code: 'CANCELLED', message: 'Task cancelled' });
                return;
            }

            logger.info({ sessionId: held.lease.session.id, steps: task.plan.steps.length }, '▶️ Task running');
            activeTasks.inc();
            try {
                const report = await this.deps.engine.run({
                    session: held.lease.session,
                    plan: task.plan,
                    descriptor,
                    signal,
                    onOutcome: outcome => {
                        task.appendOutcome(outcome);
                    },
                    onRecords: results => {
                        task.updateResults(results);
                    }
                });
                if (signal.aborted) {
                    this.complete(task, 'failed', report.results, { code: 'CANCELLED', message: 'Task cancelled' });
                } else {
                    this.complete(task, report.status, report.results, report.error);
                }
            } finally {
                activeTasks.dec();
            }
        } catch (error) {
            if (task.isTerminal()) {
                logger.debug({ err: error }, 'Late failure after task finished');
                return;
            }
            const appError = toApplicationError(error);
            logger.error({ err: error }, `Task failed: ${errorMessage(error)}`);
            this.complete(task, 'failed', undefined, { code: appError.code, message: appError.message });
        } finally {
            await held.lease?.release();
        }
    }

    private async applyEnrichment(task: Task): Promise<void> {
        let refinements: ExtractRefinement[] | null;
        try {
            refinements = await this.deps.enrichment.suggestExtras(task.goal.text, task.category);
        } catch (error) {
            logger.warn({ err: error, provider: this.deps.enrichment.name }, 'Enrichment provider threw; ignoring');
            return;
        }
        if (!refinements || refinements.length === 0) {
            return;
        }
        const enriched = this.deps.compiler.enrich(task.plan, refinements);
        if (task.replacePlan(enriched)) {
            logger.debug({ refinements: refinements.length }, 'Plan enriched');
        }
    }

    private complete(task: Task, status: TerminalStatus, results: readonly ResultRecord[] | undefined, error?: StepError): void {
        const finishedAt = new Date(this.clock.now());
        if (!task.finish(status, finishedAt, results, error)) {
            return;
        }

        const durationMs = finishedAt.getTime() - task.createdAt.getTime();
        tasksTotal.inc({ category: task.category, status });
        taskDurationSeconds.observe({ category: task.category, status }, durationMs / 1000);
        logger.info({ status, records: task.resultCount, durationMs, error }, `🏁 Task ${status}`);
    }
}
