import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
    ACTION_KINDS,
    CATEGORIES,
    type Category,
    type SiteDescriptor
} from '../types/automation.interface.js';
import { ConfigurationError, errorMessage } from '../types/errors.js';
import logger from '../utils/logger.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/site-catalog.json', import.meta.url));

const StepParamsSchema = z.object({
    url: z.string().min(1).optional(),
    text: z.string().optional(),
    submit: z.boolean().optional(),
    durationMs: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional()
}).strict();

const StepTemplateSchema = z.object({
    action: z.enum(ACTION_KINDS),
    role: z.string().min(1).optional(),
    params: StepParamsSchema.optional(),
    required: z.boolean().optional(),
    description: z.string().optional()
}).strict();

const FieldTemplateSchema = z.object({
    role: z.string().min(1),
    attribute: z.string().min(1).optional()
}).strict();

const SiteDescriptorSchema = z.object({
    category: z.enum(CATEGORIES),
    name: z.string().min(1),
    baseUrl: z.string().url(),
    steps: z.array(StepTemplateSchema),
    selectors: z.record(z.string(), z.array(z.string().min(1))),
    extraction: z.object({
        item: z.string().min(1),
        fields: z.object({
            title: FieldTemplateSchema,
            url: FieldTemplateSchema,
            price: FieldTemplateSchema.optional(),
            rating: FieldTemplateSchema.optional(),
            description: FieldTemplateSchema.optional()
        }).strict()
    }).strict()
}).strict();

const CatalogFileSchema = z.object({
    sites: z.array(SiteDescriptorSchema).min(1)
});

function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Structural problems in one descriptor. Empty when the descriptor is usable.
 */
export function validateDescriptor(descriptor: SiteDescriptor): string[] {
    const problems: string[] = [];
    const prefix = `${descriptor.category}/${descriptor.name}`;

    if (!isHttpUrl(descriptor.baseUrl)) {
        problems.push(`${prefix}: baseUrl must be an absolute http(s) URL`);
    }
    if (descriptor.steps.length === 0) {
        problems.push(`${prefix}: declares no step templates`);
    }

    const referenced = new Set<string>();
    descriptor.steps.forEach((step, index) => {
        if (step.role) {
            referenced.add(step.role);
        }
        if (step.action === 'navigate') {
            const url = step.params?.url;
            if (!url || !isHttpUrl(url.replaceAll('{query}', 'q'))) {
                problems.push(`${prefix}: step ${index} navigate needs an absolute http(s) url`);
            }
        }
        if (step.action === 'type' && !step.role) {
            problems.push(`${prefix}: step ${index} type needs a role`);
        }
        if (step.action === 'click' && !step.role) {
            problems.push(`${prefix}: step ${index} click needs a role`);
        }
    });

    referenced.add(descriptor.extraction.item);
    for (const field of Object.values(descriptor.extraction.fields)) {
        if (field) {
            referenced.add(field.role);
        }
    }

    for (const role of referenced) {
        const candidates = descriptor.selectors[role];
        if (!candidates || candidates.length === 0) {
            problems.push(`${prefix}: role '${role}' has no candidate selectors`);
        }
    }

    return problems;
}

function deepFreeze(value: unknown): void {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
}

/**
 * Read-only registry of one site descriptor per category. Validated once; any defect is fatal.
 */
export class SiteCatalog {
    private readonly byCategory = new Map<Category, SiteDescriptor>();

    constructor(descriptors: readonly SiteDescriptor[]) {
        const problems: string[] = [];

        for (const descriptor of descriptors) {
            if (this.byCategory.has(descriptor.category)) {
                problems.push(`duplicate entry for category '${descriptor.category}'`);
                continue;
            }
            problems.push(...validateDescriptor(descriptor));
            this.byCategory.set(descriptor.category, descriptor);
        }

        if (!this.byCategory.has('generic')) {
            problems.push(`missing the 'generic' fallback entry`);
        }

        if (problems.length > 0) {
            throw new ConfigurationError(`Invalid site catalog: ${problems.join('; ')}`, { problems });
        }

        for (const descriptor of this.byCategory.values()) {
            deepFreeze(descriptor);
        }
    }

    static fromJSON(raw: unknown): SiteCatalog {
        const parsed = CatalogFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            throw new ConfigurationError(`Invalid site catalog: ${issues.join('; ')}`, { issues });
        }
        return new SiteCatalog(parsed.data.sites);
    }

    static fromFile(path: string = DEFAULT_CATALOG_PATH): SiteCatalog {
        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(path, 'utf8'));
        } catch (error) {
            throw new ConfigurationError(`Cannot read site catalog at ${path}: ${errorMessage(error)}`, { path });
        }
        const catalog = SiteCatalog.fromJSON(raw);
        logger.info({ categories: catalog.categories() }, `📚 Site catalog loaded (${catalog.size} sites)`);
        return catalog;
    }

    /**
     * Descriptor for `category`, or the generic one
     */
    get(category: Category): SiteDescriptor {
        const descriptor = this.byCategory.get(category) ?? this.byCategory.get('generic');
        if (!descriptor) {
            // Constructor guarantees the generic entry
            throw new ConfigurationError('Site catalog has no generic entry');
        }
        return descriptor;
    }

    has(category: Category): boolean {
        return this.byCategory.has(category);
    }

    categories(): Category[] {
        return Array.from(this.byCategory.keys());
    }

    get size(): number {
        return this.byCategory.size;
    }
}
