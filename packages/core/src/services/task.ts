import type {
    Category,
    ExecutionPlan,
    Goal,
    ResultRecord,
    StepError,
    StepOutcome,
    TaskSnapshot,
    TaskStatus,
    TerminalStatus
} from '@webpilot/shared';

export interface TaskInit {
    id: string;
    goal: Goal;
    category: Category;
    plan: ExecutionPlan;
    createdAt: Date;
}

/**
 * One goal's lifecycle. Status only moves forward:
 * pending → running → terminal, or pending → failed.
 * Once terminal, every further write is ignored.
 */
export class Task {
    readonly id: string;
    readonly goal: Goal;
    readonly category: Category;
    readonly createdAt: Date;

    private _plan: ExecutionPlan;
    private _status: TaskStatus = 'pending';
    private readonly outcomes: StepOutcome[] = [];
    private results: ResultRecord[] = [];
    private error?: StepError;
    private startedAt?: Date;
    private finishedAt?: Date;

    constructor(init: TaskInit) {
        this.id = init.id;
        this.goal = init.goal;
        this.category = init.category;
        this.createdAt = init.createdAt;
        this._plan = init.plan;
    }

    get status(): TaskStatus {
        return this._status;
    }

    get plan(): ExecutionPlan {
        return this._plan;
    }

    get finishedAtMs(): number | undefined {
        return this.finishedAt?.getTime();
    }

    isTerminal(): boolean {
        return this._status !== 'pending' && this._status !== 'running';
    }

    /**
     * Swap in an enriched plan. Only allowed before execution starts.
     */
    replacePlan(plan: ExecutionPlan): boolean {
        if (this._status !== 'pending') {
            return false;
        }
        this._plan = plan;
        return true;
    }

    start(at: Date): boolean {
        if (this._status !== 'pending') {
            return false;
        }
        this._status = 'running';
        this.startedAt = at;
        return true;
    }

    appendOutcome(outcome: StepOutcome): boolean {
        if (this._status !== 'running') {
            return false;
        }
        this.outcomes.push(outcome);
        return true;
    }

    get resultCount(): number {
        return this.results.length;
    }

    /**
     * Records gathered so far, kept if the run never reports back.
     */
    updateResults(results: readonly ResultRecord[]): boolean {
        if (this._status !== 'running') {
            return false;
        }
        this.results = [...results];
        return true;
    }

    /**
     * Without `results` the records gathered so far are kept.
     */
    finish(status: TerminalStatus, at: Date, results?: readonly ResultRecord[], error?: StepError): boolean {
        if (this.isTerminal()) {
            return false;
        }
        this._status = status;
        this.finishedAt = at;
        if (results) {
            this.results = [...results];
        }
        if (error) {
            this.error = error;
        }
        return true;
    }

    toSnapshot(): TaskSnapshot {
        const snapshot: TaskSnapshot = {
            id: this.id,
            goal: { text: this.goal.text, submittedAt: this.goal.submittedAt.toISOString() },
            category: this.category,
            site: this._plan.site,
            status: this._status,
            plan: this._plan,
            outcomes: [...this.outcomes],
            results: [...this.results],
            createdAt: this.createdAt.toISOString()
        };
        if (this.error) snapshot.error = this.error;
        if (this.startedAt) snapshot.startedAt = this.startedAt.toISOString();
        if (this.finishedAt) snapshot.finishedAt = this.finishedAt.toISOString();
        return snapshot;
    }
}
