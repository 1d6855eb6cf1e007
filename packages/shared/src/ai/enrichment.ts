import { z } from 'zod';
import { RECORD_FIELDS, type Category, type ExtractRefinement } from '../types/automation.interface.js';
import type { LLMProvider } from './llm/interfaces.js';
import { OpenAIProvider } from './llm/openai.js';
import { enrichmentRequestsTotal } from '../observability/metrics.js';
import { withTimeout } from '../utils/timing.js';
import logger from '../utils/logger.js';

/**
 * Optional source of extra, lowest-ranked extraction candidates for a goal.
 * Returns null when it has nothing to offer or fails.
 */
export interface IEnrichmentProvider {
    readonly name: string;
    suggestExtras(goal: string, category: Category): Promise<ExtractRefinement[] | null>;
}

export class NoopEnrichmentProvider implements IEnrichmentProvider {
    public readonly name = 'noop';

    async suggestExtras(): Promise<ExtractRefinement[] | null> {
        return null;
    }
}

export const EnrichmentSchema = z.object({
    refinements: z.array(z.object({
        field: z.enum(RECORD_FIELDS),
        selector: z.string().min(1).max(200),
        attribute: z.string().min(1).max(40).optional()
    })).max(10)
});

export const ENRICHMENT_SYSTEM_PROMPT = `You help a browser automation engine read search result pages.
Given a user goal and a site category, suggest extra CSS selectors for result fields.
Selectors are evaluated relative to one result item. Only suggest selectors you expect on typical pages of that category.`;

export const ENRICHMENT_USER_PROMPT = (goal: string, category: Category) => `
**Goal**: ${goal}
**Category**: ${category}
**Fields**: ${RECORD_FIELDS.join(', ')}

Respond in JSON:
{
  "refinements": [
    { "field": "price", "selector": "CSS selector inside one result item", "attribute": "optional attribute to read instead of text" }
  ]
}`;

export interface LLMEnrichmentOptions {
    timeoutMs: number;
}

/**
 * Asks a language model for extra field selectors. Any failure, including a
 * timeout or an open circuit, yields null.
 */
export class LLMEnrichmentProvider implements IEnrichmentProvider {
    public readonly name: string;

    constructor(
        private readonly llm: LLMProvider,
        private readonly options: LLMEnrichmentOptions
    ) {
        this.name = `llm:${llm.name}`;
    }

    async suggestExtras(goal: string, category: Category): Promise<ExtractRefinement[] | null> {
        const controller = new AbortController();
        try {
            const output = await withTimeout(
                this.llm.generateJSON(ENRICHMENT_USER_PROMPT(goal, category), EnrichmentSchema, {
                    systemPrompt: ENRICHMENT_SYSTEM_PROMPT,
                    temperature: 0,
                    maxTokens: 400,
                    signal: controller.signal
                }),
                this.options.timeoutMs,
                'Enrichment'
            );

            enrichmentRequestsTotal.inc({ outcome: 'success' });
            if (output.refinements.length === 0) {
                return null;
            }
            return output.refinements.map(({ field, selector, attribute }) =>
                attribute ? { field, selector, attribute } : { field, selector }
            );
        } catch (error) {
            controller.abort();
            enrichmentRequestsTotal.inc({ outcome: 'failure' });
            logger.warn({ err: error, category, provider: this.name }, 'Enrichment failed; continuing without refinements');
            return null;
        }
    }
}

export interface EnrichmentSettings {
    enabled: boolean;
    apiKey?: string;
    model: string;
    timeoutMs: number;
}

/**
 * Noop unless enrichment is switched on and an API key is present.
 */
export function createEnrichmentProvider(settings: EnrichmentSettings): IEnrichmentProvider {
    if (!settings.enabled || !settings.apiKey) {
        return new NoopEnrichmentProvider();
    }
    logger.info({ model: settings.model }, '🤖 LLM enrichment enabled');
    return new LLMEnrichmentProvider(
        new OpenAIProvider({ apiKey: settings.apiKey, model: settings.model }),
        { timeoutMs: settings.timeoutMs }
    );
}
