import type { IBrowserSession } from '../types/browser.interface.js';
import {
    RECORD_FIELDS,
    type ExtractRefinement,
    type ExtractionMode,
    type FieldTemplate,
    type RecordField,
    type ResultRecord,
    type SiteDescriptor
} from '../types/automation.interface.js';
import { HtmlParser, type Selection } from '../utils/html-parser.js';
import { recordsExtractedTotal } from '../observability/metrics.js';
import logger from '../utils/logger.js';

export interface ExtractorOptions {
    /** Below this many template records the generic fallback runs */
    minTemplateRecords: number;
    fallbackMinTextLength: number;
    maxRecords: number;
}

export interface ExtractionResult {
    records: ResultRecord[];
    mode: ExtractionMode;
    templateCount: number;
    fallbackCount: number;
    /** Set when the page could not be read; records are then empty */
    failure?: unknown;
}

interface FieldCandidate {
    selector: string;
    attribute?: string;
}

const MAX_TITLE_LENGTH = 200;

const EXCLUDED_REGIONS = 'nav, header, footer, script, style, noscript, template';

const HIDDEN_SUBTREE = [
    '[hidden]',
    '[aria-hidden="true"]',
    '[style*="display:none"]',
    '[style*="display: none"]',
    '[style*="visibility:hidden"]',
    '[style*="visibility: hidden"]'
].join(', ');

/**
 * Absolute http(s) form of `href` relative to `base`, or null
 */
export function toAbsoluteUrl(href: string, base: string): string | null {
    const trimmed = href.trim();
    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }
    try {
        const url = new URL(trimmed, base);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            return null;
        }
        return url.toString();
    } catch {
        return null;
    }
}

/**
 * First occurrence of each url wins; order is kept.
 */
export function dedupeByUrl(records: readonly ResultRecord[]): ResultRecord[] {
    const seen = new Set<string>();
    const unique: ResultRecord[] = [];
    for (const record of records) {
        if (!seen.has(record.url)) {
            seen.add(record.url);
            unique.push(record);
        }
    }
    return unique;
}

/**
 * Cuts on code points so a surrogate pair is never split.
 */
export function truncate(value: string, length: number): string {
    const chars = Array.from(value);
    return chars.length > length ? `${chars.slice(0, length - 1).join('').trimEnd()}…` : value;
}

/**
 * Page state to normalized records: site template first, generic anchor scan when the
 * template comes up short.
 */
export class ResultExtractor {
    constructor(private readonly options: ExtractorOptions) { }

    /**
     * Never rejects. A page that cannot be read yields no records and a `failure`.
     */
    async extract(
        session: IBrowserSession,
        descriptor: SiteDescriptor,
        refinements: readonly ExtractRefinement[] = []
    ): Promise<ExtractionResult> {
        try {
            const html = await session.content();
            const result = this.parse(html, session.url(), descriptor, refinements);
            recordsExtractedTotal.inc({ mode: result.mode }, result.records.length);
            return result;
        } catch (error) {
            logger.warn({ err: error, site: descriptor.name }, 'Extraction failed; returning no records');
            return { records: [], mode: 'template', templateCount: 0, fallbackCount: 0, failure: error };
        }
    }

    parse(
        html: string,
        pageUrl: string,
        descriptor: SiteDescriptor,
        refinements: readonly ExtractRefinement[] = []
    ): ExtractionResult {
        const parser = new HtmlParser(html);
        // Cards repeating one link count once toward the threshold
        const templateRecords = dedupeByUrl(this.applyTemplate(parser, pageUrl, descriptor, refinements));

        if (templateRecords.length >= this.options.minTemplateRecords) {
            const records = templateRecords.slice(0, this.options.maxRecords);
            return { records, mode: 'template', templateCount: templateRecords.length, fallbackCount: 0 };
        }

        const fallbackRecords = this.scanAnchors(parser, pageUrl, descriptor.name);
        logger.debug({
            site: descriptor.name,
            templateCount: templateRecords.length,
            fallbackCount: fallbackRecords.length
        }, 'Template yielded too few records; generic fallback used');

        const records = dedupeByUrl([...templateRecords, ...fallbackRecords]).slice(0, this.options.maxRecords);
        return {
            records,
            mode: 'fallback',
            templateCount: templateRecords.length,
            fallbackCount: fallbackRecords.length
        };
    }

    private applyTemplate(
        parser: HtmlParser,
        pageUrl: string,
        descriptor: SiteDescriptor,
        refinements: readonly ExtractRefinement[]
    ): ResultRecord[] {
        const { extraction, selectors } = descriptor;

        let items: Selection | null = null;
        for (const candidate of selectors[extraction.item] ?? []) {
            const matched = parser.select(candidate);
            if (matched.length > 0) {
                items = matched;
                break;
            }
        }
        if (!items) {
            return [];
        }

        const fieldCandidates = new Map<RecordField, FieldCandidate[]>();
        for (const field of RECORD_FIELDS) {
            const template: FieldTemplate | undefined = extraction.fields[field];
            const ranked: FieldCandidate[] = template
                ? (selectors[template.role] ?? []).map(selector => ({ selector, attribute: template.attribute }))
                : [];
            for (const refinement of refinements) {
                if (refinement.field === field) {
                    ranked.push({ selector: refinement.selector, attribute: refinement.attribute });
                }
            }
            fieldCandidates.set(field, ranked);
        }

        const records: ResultRecord[] = [];
        items.each((_, node) => {
            const item = parser.wrap(node);
            const read = (field: RecordField): string | null => {
                for (const candidate of fieldCandidates.get(field) ?? []) {
                    const value = parser.readField(item, candidate.selector, candidate.attribute);
                    if (value) {
                        return value;
                    }
                }
                return null;
            };

            const href = read('url');
            const url = href ? toAbsoluteUrl(href, pageUrl) : null;
            if (!url) {
                return;
            }

            const title = read('title') ?? parser.text(item);
            const record: ResultRecord = {
                title: truncate(title || url, MAX_TITLE_LENGTH),
                url,
                source: descriptor.name
            };
            const price = read('price');
            const rating = read('rating');
            const description = read('description');
            if (price) record.price = price;
            if (rating) record.rating = rating;
            if (description) record.description = description;
            records.push(record);
        });

        return records;
    }

    private scanAnchors(parser: HtmlParser, pageUrl: string, source: string): ResultRecord[] {
        const records: ResultRecord[] = [];
        parser.select('a[href]').each((_, node) => {
            const anchor = parser.wrap(node);
            if (anchor.closest(EXCLUDED_REGIONS).length > 0 || anchor.closest(HIDDEN_SUBTREE).length > 0) {
                return;
            }
            const text = parser.text(anchor);
            if (text.length < this.options.fallbackMinTextLength) {
                return;
            }
            const url = toAbsoluteUrl(anchor.attr('href') ?? '', pageUrl);
            if (!url) {
                return;
            }
            records.push({ title: truncate(text, MAX_TITLE_LENGTH), url, source });
        });
        return records;
    }
}
