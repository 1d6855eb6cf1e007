import type { SiteDescriptor } from '@webpilot/shared';

/**
 * Small self-contained site used by engine and extractor tests.
 */
export function shopDescriptor(overrides: Partial<SiteDescriptor> = {}): SiteDescriptor {
    return {
        category: 'shopping',
        name: 'test-shop',
        baseUrl: 'https://shop.test',
        steps: [
            { action: 'navigate', params: { url: 'https://shop.test/' }, required: true },
            { action: 'type', role: 'searchInput', params: { text: '{query}', submit: true }, required: true },
            { action: 'waitFor', role: 'resultList' },
            { action: 'extract' }
        ],
        selectors: {
            searchInput: ['#search', 'input[name="q"]'],
            resultList: ['.results'],
            item: ['.product', 'li.item'],
            itemTitle: ['h2 a', 'h2'],
            itemLink: ['h2 a'],
            itemPrice: ['.price']
        },
        extraction: {
            item: 'item',
            fields: {
                title: { role: 'itemTitle' },
                url: { role: 'itemLink', attribute: 'href' },
                price: { role: 'itemPrice' }
            }
        },
        ...overrides
    };
}

export function product(id: string, title: string, price: string): string {
    return `<div class="product"><h2><a href="/p/${id}">${title}</a></h2><span class="price">${price}</span></div>`;
}

export const SHOP_HOME = `<html><body>
  <form><input id="search" name="q" type="text"></form>
</body></html>`;

export function resultsPage(items: string[]): string {
    return `<html><body><div class="results">${items.join('')}</div></body></html>`;
}
