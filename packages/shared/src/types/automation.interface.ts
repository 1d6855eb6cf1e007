export const CATEGORIES = [
    'shopping',
    'news',
    'jobs',
    'travel',
    'video',
    'restaurant',
    'books',
    'generic'
] as const;

export type Category = typeof CATEGORIES[number];

const CATEGORY_SET: ReadonlySet<string> = new Set(CATEGORIES);

export function isCategory(value: string): value is Category {
    return CATEGORY_SET.has(value);
}

export interface Goal {
    readonly text: string;
    readonly submittedAt: Date;
}

export const ACTION_KINDS = ['navigate', 'type', 'click', 'waitFor', 'scroll', 'extract'] as const;

export type ActionKind = typeof ACTION_KINDS[number];

export interface StepParams {
    /** Absolute URL, may contain a {query} slot */
    url?: string;
    /** Text to type, may contain a {query} slot */
    text?: string;
    /** Press Enter after typing */
    submit?: boolean;
    /** Plain wait when a waitFor step has no role */
    durationMs?: number;
    /** Overrides the resolver budget for this step */
    timeoutMs?: number;
}

export interface StepTemplate {
    action: ActionKind;
    /** Logical element name looked up in the site's SelectorSet */
    role?: string;
    params?: StepParams;
    required?: boolean;
    description?: string;
}

/** role -> candidate selectors, most specific first */
export type SelectorSet = Readonly<Record<string, readonly string[]>>;

export const RECORD_FIELDS = ['title', 'url', 'price', 'rating', 'description'] as const;

export type RecordField = typeof RECORD_FIELDS[number];

export interface FieldTemplate {
    role: string;
    /** Read this attribute instead of the element text */
    attribute?: string;
}

export interface ExtractionTemplate {
    /** Role whose candidates match one result item each */
    item: string;
    fields: {
        title: FieldTemplate;
        url: FieldTemplate;
        price?: FieldTemplate;
        rating?: FieldTemplate;
        description?: FieldTemplate;
    };
}

export interface SiteDescriptor {
    category: Category;
    name: string;
    baseUrl: string;
    steps: readonly StepTemplate[];
    selectors: SelectorSet;
    extraction: ExtractionTemplate;
}

/**
 * Extra, lowest-ranked field candidate proposed by an enrichment provider.
 */
export interface ExtractRefinement {
    field: RecordField;
    selector: string;
    attribute?: string;
}

export interface BoundParams {
    url?: string;
    text?: string;
    submit?: boolean;
    durationMs?: number;
    timeoutMs?: number;
}

export interface Step {
    index: number;
    action: ActionKind;
    role?: string;
    params: BoundParams;
    required: boolean;
    description?: string;
    refinements?: readonly ExtractRefinement[];
}

export interface ExecutionPlan {
    category: Category;
    site: string;
    queryTerms: readonly string[];
    steps: readonly Step[];
}

export type StepStatus = 'ok' | 'skipped' | 'failed';

export type ProbeResult = 'resolved' | 'missing' | 'not-interactable' | 'timeout' | 'error' | 'budget-exhausted';

export interface ResolutionAttempt {
    selector: string;
    result: ProbeResult;
    elapsedMs: number;
}

export type ExtractionMode = 'template' | 'fallback';

export interface StepError {
    code: string;
    message: string;
}

export interface StepOutcome {
    index: number;
    action: ActionKind;
    role?: string;
    required: boolean;
    status: StepStatus;
    selector?: string;
    candidatesTried?: string[];
    attempts?: ResolutionAttempt[];
    error?: StepError;
    elapsedMs: number;
    recordCount?: number;
    extractionMode?: ExtractionMode;
}

export interface ResultRecord {
    title: string;
    url: string;
    price?: string;
    rating?: string;
    description?: string;
    source: string;
}

export const TASK_STATUSES = ['pending', 'running', 'succeeded', 'partially_succeeded', 'failed'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export type TerminalStatus = Extract<TaskStatus, 'succeeded' | 'partially_succeeded' | 'failed'>;

export interface Classification {
    category: Category;
    queryTerms: string[];
}

export interface TaskSnapshot {
    id: string;
    goal: { text: string; submittedAt: string };
    category: Category;
    site: string;
    status: TaskStatus;
    plan: ExecutionPlan;
    outcomes: StepOutcome[];
    results: ResultRecord[];
    error?: StepError;
    createdAt: string;
    startedAt?: string;
    finishedAt?: string;
}
