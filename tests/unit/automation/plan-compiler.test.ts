import { describe, it, expect } from 'vitest';
import { CompilationError, PlanCompiler, SiteCatalog } from '@webpilot/shared';
import { shopDescriptor } from '../../utils/fixtures.js';

describe('PlanCompiler', () => {
    const compiler = new PlanCompiler();
    const catalog = SiteCatalog.fromFile();

    it('compiles the halloween plan against the shopping site', () => {
        const plan = compiler.compile('shopping', ['cheapest', 'halloween', 'dress'], catalog.get('shopping'));

        expect(plan.site).toBe('amazon');
        expect(plan.steps.map(step => step.action)).toEqual(['navigate', 'type', 'waitFor', 'scroll', 'extract']);
        expect(plan.steps[0]?.params.url).toBe('https://www.amazon.com');
        expect(plan.steps[1]?.params).toEqual({ text: 'cheapest halloween dress', submit: true });
        expect(plan.steps[1]?.required).toBe(true);
        expect(plan.steps[2]?.required).toBe(false);
    });

    it('url-encodes the query inside navigate urls only', () => {
        const plan = compiler.compile('news', ['mars', 'rover&co'], catalog.get('news'));
        expect(plan.steps[0]?.params.url).toBe('https://www.bing.com/news/search?q=mars%20rover%26co');
    });

    it('compiles a navigate and extract pair for gibberish on the generic site', () => {
        const plan = compiler.compile('generic', ['asdkjaslkdj'], catalog.get('generic'));
        const actions = plan.steps.map(step => step.action);
        expect(plan.site).toBe('duckduckgo');
        expect(actions[0]).toBe('navigate');
        expect(actions).toContain('extract');
    });

    it('is deterministic', () => {
        const descriptor = catalog.get('jobs');
        const first = compiler.compile('jobs', ['rust', 'developer'], descriptor);
        const second = compiler.compile('jobs', ['rust', 'developer'], descriptor);
        expect(second).toEqual(first);
        expect(second).not.toBe(first);
    });

    it('freezes the plan', () => {
        const plan = compiler.compile('shopping', ['socks'], shopDescriptor());
        expect(Object.isFrozen(plan)).toBe(true);
        expect(Object.isFrozen(plan.steps)).toBe(true);
        expect(Object.isFrozen(plan.steps[0])).toBe(true);
    });

    it('throws CompilationError for a descriptor without steps', () => {
        const descriptor = shopDescriptor({ steps: [] });
        expect(() => compiler.compile('shopping', ['socks'], descriptor)).toThrow(CompilationError);
        expect(() => compiler.compile('shopping', ['socks'], descriptor)).toThrow(
            "Site 'test-shop' declares no step templates"
        );
    });

    it('starts from a caller-supplied page', () => {
        const plan = compiler.compile('shopping', ['socks'], shopDescriptor(), { startUrl: 'https://outlet.test/socks' });

        expect(plan.steps[0]?.params.url).toBe('https://outlet.test/socks');
        expect(plan.steps[1]?.params).toEqual({ text: 'socks', submit: true });
        expect(plan.site).toBe('test-shop');
    });

    it('refuses a start page for a site without a navigate step', () => {
        const descriptor = shopDescriptor({ steps: [{ action: 'extract' }] });

        expect(() => compiler.compile('shopping', ['socks'], descriptor, { startUrl: 'https://outlet.test/' })).toThrow(
            "Site 'test-shop' has no navigate step to start from"
        );
    });

    describe('enrich', () => {
        const plan = compiler.compile('shopping', ['socks'], shopDescriptor());

        it('attaches refinements to extract steps only', () => {
            const enriched = compiler.enrich(plan, [{ field: 'rating', selector: ' .stars ', attribute: 'title' }]);

            expect(enriched.steps.map(step => step.action)).toEqual(plan.steps.map(step => step.action));
            expect(enriched.steps[3]?.refinements).toEqual([{ field: 'rating', selector: '.stars', attribute: 'title' }]);
            for (const index of [0, 1, 2]) {
                expect(enriched.steps[index]).toBe(plan.steps[index]);
            }
            expect(plan.steps[3]?.refinements).toBeUndefined();
        });

        it('drops refinements with an empty selector', () => {
            expect(compiler.enrich(plan, [{ field: 'price', selector: '   ' }])).toBe(plan);
        });
    });
});
