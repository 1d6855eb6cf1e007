import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

export type Selection = cheerio.Cheerio<AnyNode>;

/**
 * Thin typed wrapper around a cheerio document.
 */
export class HtmlParser {
    private readonly $: cheerio.CheerioAPI;

    constructor(html: string) {
        this.$ = cheerio.load(html);
    }

    /**
     * Elements matching `selector`, optionally scoped to `within`. Invalid selectors match nothing.
     */
    select(selector: string, within?: Selection): Selection {
        try {
            return within ? within.find(selector) : this.$(selector);
        } catch {
            const none: AnyNode[] = [];
            return this.$(none);
        }
    }

    exists(selector: string): boolean {
        return this.select(selector).length > 0;
    }

    /**
     * Text or attribute of the first match inside `within`, whitespace collapsed
     */
    readField(within: Selection, selector: string, attribute?: string): string | null {
        const target = this.select(selector, within).first();
        if (target.length === 0) {
            return null;
        }
        const raw = attribute ? target.attr(attribute) : target.text();
        const value = collapseWhitespace(raw ?? '');
        return value || null;
    }

    /**
     * Visible text of an element, whitespace collapsed
     */
    text(element: Selection): string {
        return collapseWhitespace(element.text());
    }

    /**
     * Wrap raw nodes into a selection
     */
    wrap(node: AnyNode): Selection {
        return this.$(node);
    }

    getHtml(selector?: string): string {
        return selector ? this.select(selector).html() ?? '' : this.$.html();
    }
}

export function collapseWhitespace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}
