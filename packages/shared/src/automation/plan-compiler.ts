import {
    RECORD_FIELDS,
    type BoundParams,
    type Category,
    type ExecutionPlan,
    type ExtractRefinement,
    type SiteDescriptor,
    type Step,
    type StepParams
} from '../types/automation.interface.js';
import { CompilationError } from '../types/errors.js';

const QUERY_SLOT = '{query}';
const KNOWN_FIELDS: ReadonlySet<string> = new Set(RECORD_FIELDS);

function bindParams(params: StepParams | undefined, query: string): BoundParams {
    const bound: BoundParams = {};
    if (!params) {
        return bound;
    }
    if (params.url !== undefined) {
        bound.url = params.url.replaceAll(QUERY_SLOT, encodeURIComponent(query));
    }
    if (params.text !== undefined) {
        bound.text = params.text.replaceAll(QUERY_SLOT, query);
    }
    if (params.submit !== undefined) {
        bound.submit = params.submit;
    }
    if (params.durationMs !== undefined) {
        bound.durationMs = params.durationMs;
    }
    if (params.timeoutMs !== undefined) {
        bound.timeoutMs = params.timeoutMs;
    }
    return bound;
}

function freezePlan(plan: ExecutionPlan): ExecutionPlan {
    for (const step of plan.steps) {
        Object.freeze(step.params);
        if (step.refinements) {
            step.refinements.forEach(refinement => Object.freeze(refinement));
            Object.freeze(step.refinements);
        }
        Object.freeze(step);
    }
    Object.freeze(plan.steps);
    Object.freeze(plan.queryTerms);
    return Object.freeze(plan);
}

function isUsableRefinement(refinement: ExtractRefinement): boolean {
    return KNOWN_FIELDS.has(refinement.field)
        && refinement.selector.trim().length > 0;
}

export interface CompileOptions {
    /** Caller-supplied page that replaces the first navigate target */
    startUrl?: string;
}

/**
 * Turns a site's step templates into a concrete, immutable plan.
 * Deterministic: the same inputs always give a structurally identical plan.
 */
export class PlanCompiler {
    compile(
        category: Category,
        queryTerms: readonly string[],
        descriptor: SiteDescriptor,
        options: CompileOptions = {}
    ): ExecutionPlan {
        if (descriptor.steps.length === 0) {
            throw new CompilationError(`Site '${descriptor.name}' declares no step templates`, descriptor.name, { category });
        }

        const query = queryTerms.join(' ');

        const steps: Step[] = descriptor.steps.map((template, index) => {
            const step: Step = {
                index,
                action: template.action,
                params: bindParams(template.params, query),
                required: template.required ?? false
            };
            if (template.role !== undefined) {
                step.role = template.role;
            }
            if (template.description !== undefined) {
                step.description = template.description;
            }
            return step;
        });

        if (options.startUrl !== undefined) {
            const entry = steps.find(step => step.action === 'navigate');
            if (!entry) {
                throw new CompilationError(`Site '${descriptor.name}' has no navigate step to start from`, descriptor.name, { category });
            }
            entry.params.url = options.startUrl;
        }

        return freezePlan({
            category,
            site: descriptor.name,
            queryTerms: [...queryTerms],
            steps
        });
    }

    /**
     * Attach extract-stage refinements. Every other step keeps its identity and position.
     */
    enrich(plan: ExecutionPlan, refinements: readonly ExtractRefinement[]): ExecutionPlan {
        const usable = refinements
            .filter(isUsableRefinement)
            .map(refinement => ({ ...refinement, selector: refinement.selector.trim() }));
        if (usable.length === 0) {
            return plan;
        }

        const steps = plan.steps.map(step =>
            step.action === 'extract'
                ? { ...step, params: { ...step.params }, refinements: [...(step.refinements ?? []), ...usable] }
                : step
        );

        return freezePlan({ ...plan, queryTerms: [...plan.queryTerms], steps });
    }
}

export const planCompiler = new PlanCompiler();
