import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';
import logger from '../utils/logger.js';

// One registry for the whole process
export const register = new Registry();

let initialized = false;

export function initMetrics(): void {
    if (initialized) return;

    collectDefaultMetrics({ register });
    logger.info('📊 Metrics registry initialized');
    initialized = true;
}

export async function getMetrics(): Promise<string> {
    return register.metrics();
}

// ============================================
// Task Lifecycle
// ============================================

export const tasksTotal = new Counter({
    name: 'automation_tasks_total',
    help: 'Finished tasks by category and terminal status',
    labelNames: ['category', 'status'],
    registers: [register],
});

export const activeTasks = new Gauge({
    name: 'automation_active_tasks',
    help: 'Tasks currently holding a browser session',
    registers: [register],
});

export const taskDurationSeconds = new Histogram({
    name: 'automation_task_duration_seconds',
    help: 'Wall-clock time from start to terminal status',
    labelNames: ['category', 'status'],
    buckets: [1, 5, 10, 30, 60, 120, 300],
    registers: [register],
});

// ============================================
// Steps & Resolution
// ============================================

export const stepOutcomesTotal = new Counter({
    name: 'automation_step_outcomes_total',
    help: 'Executed plan steps by action and status',
    labelNames: ['action', 'status'],
    registers: [register],
});

export const selectorResolutionSeconds = new Histogram({
    name: 'automation_selector_resolution_seconds',
    help: 'Time spent resolving one role across its candidates',
    labelNames: ['found'],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [register],
});

// ============================================
// Extraction
// ============================================

export const recordsExtractedTotal = new Counter({
    name: 'automation_records_extracted_total',
    help: 'Records returned by the extractor by mode',
    labelNames: ['mode'],
    registers: [register],
});

export const enrichmentRequestsTotal = new Counter({
    name: 'automation_enrichment_requests_total',
    help: 'Enrichment calls by outcome',
    labelNames: ['outcome'],
    registers: [register],
});
