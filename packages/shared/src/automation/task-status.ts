import type { StepOutcome, TerminalStatus } from '../types/automation.interface.js';

/**
 * Terminal status from the final trace alone.
 *
 * 1. a failed navigate or a lost session means the run broke: failed
 * 2. every step ok and no extract needed the generic fallback to find records: succeeded
 * 3. some extract produced records despite anything else: partially_succeeded
 * 4. otherwise failed
 */
export function deriveTaskStatus(outcomes: readonly StepOutcome[]): TerminalStatus {
    const broken = outcomes.some(outcome =>
        outcome.status === 'failed' && (outcome.action === 'navigate' || outcome.error?.code === 'SESSION_FAILURE')
    );
    if (broken) {
        return 'failed';
    }

    const extracts = outcomes.filter(outcome => outcome.action === 'extract' && outcome.status === 'ok');
    const yielded = extracts.filter(outcome => (outcome.recordCount ?? 0) > 0);
    const allOk = outcomes.length > 0 && outcomes.every(outcome => outcome.status === 'ok');

    // An empty page after a clean run is a content fact
    if (allOk && !yielded.some(outcome => outcome.extractionMode === 'fallback')) {
        return 'succeeded';
    }

    return yielded.length > 0 ? 'partially_succeeded' : 'failed';
}
