import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CATEGORIES, type Category, type Classification } from '../types/automation.interface.js';
import { ConfigurationError, errorMessage } from '../types/errors.js';

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../data/intent-rules.json', import.meta.url));

const IntentRuleSchema = z.object({
    category: z.enum(CATEGORIES),
    /** Intent words: classify and are stripped from the query */
    keywords: z.array(z.string().min(1)).min(1),
    /** Domain nouns: classify but stay in the query */
    hints: z.array(z.string().min(1)).default([])
});

const IntentRulesSchema = z.object({
    stopWords: z.array(z.string()),
    rules: z.array(IntentRuleSchema)
});

export type IntentRules = z.input<typeof IntentRulesSchema>;

interface CompiledRule {
    category: Category;
    keywords: ReadonlySet<string>;
    hints: ReadonlySet<string>;
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Lowercased tokens with leading and trailing punctuation trimmed, empties dropped
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/\s+/)
        .map(token => token.replace(EDGE_PUNCTUATION, ''))
        .filter(token => token.length > 0);
}

/**
 * Ranked keyword rules evaluated in one pass; the first rule with a matching token wins.
 * Total: anything unmatched is `generic`.
 */
export class IntentClassifier {
    private readonly rules: CompiledRule[];
    private readonly stopWords: ReadonlySet<string>;

    constructor(rules: IntentRules) {
        const parsed = IntentRulesSchema.safeParse(rules);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            throw new ConfigurationError(`Invalid intent rules: ${issues.join('; ')}`, { issues });
        }

        this.stopWords = new Set(parsed.data.stopWords.map(word => word.toLowerCase()));
        this.rules = parsed.data.rules.map(rule => ({
            category: rule.category,
            keywords: new Set(rule.keywords.map(word => word.toLowerCase())),
            hints: new Set(rule.hints.map(word => word.toLowerCase()))
        }));
    }

    static fromFile(path: string = DEFAULT_RULES_PATH): IntentClassifier {
        let raw: IntentRules;
        try {
            raw = IntentRulesSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
        } catch (error) {
            throw new ConfigurationError(`Cannot load intent rules from ${path}: ${errorMessage(error)}`, { path });
        }
        return new IntentClassifier(raw);
    }

    classify(goal: string): Classification {
        const tokens = tokenize(goal);
        const rule = this.rules.find(candidate =>
            tokens.some(token => candidate.keywords.has(token) || candidate.hints.has(token))
        );

        const stripped = tokens.filter(token =>
            !this.stopWords.has(token) && !(rule?.keywords.has(token) ?? false)
        );

        return {
            category: rule?.category ?? 'generic',
            queryTerms: stripped.length > 0 ? stripped : tokens
        };
    }
}
