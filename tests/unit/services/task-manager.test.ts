import { describe, it, expect, afterEach } from 'vitest';
import {
    EvasionService,
    ExecutionEngine,
    IntentClassifier,
    NoopEnrichmentProvider,
    NotFoundError,
    PlanCompiler,
    ResultExtractor,
    SelectorResolver,
    SessionPool,
    ShuttingDownError,
    SiteCatalog,
    type ExtractRefinement,
    type IEnrichmentProvider
} from '@webpilot/shared';
import { TaskManager } from '../../../packages/core/src/services/task-manager.js';
import { FakeDriver, InstantClock, ManualClock, flush, type FakeSiteOptions } from '../../utils/fake-browser.js';
import { SHOP_HOME, product, resultsPage, shopDescriptor } from '../../utils/fixtures.js';

const START = Date.parse('2026-03-01T10:00:00.000Z');
const TASK_TIMEOUT_MS = 5000;
const RETENTION_MS = 60000;

const SHOP_SITE: FakeSiteOptions = {
    pages: {
        'https://shop.test/': { html: SHOP_HOME },
        'https://shop.test/search': {
            html: resultsPage([
                product('1', 'Wool socks', '$9'),
                product('2', 'Cotton socks', '$5'),
                product('3', 'Hiking socks', '$14')
            ])
        }
    },
    onSubmit: () => 'https://shop.test/search'
};

const catalog = new SiteCatalog([
    shopDescriptor(),
    shopDescriptor({
        category: 'generic',
        name: 'test-generic',
        baseUrl: 'https://generic.test',
        steps: [
            { action: 'navigate', params: { url: 'https://generic.test/' }, required: true },
            { action: 'extract' }
        ]
    }),
    shopDescriptor({
        category: 'news',
        name: 'test-news',
        baseUrl: 'https://news.test',
        steps: [
            { action: 'navigate', params: { url: 'https://news.test/' }, required: true },
            { action: 'extract' },
            { action: 'navigate', params: { url: 'https://news.test/archive' } },
            { action: 'extract' }
        ]
    })
]);

const classifier = new IntentClassifier({
    stopWords: ['for', 'some'],
    rules: [
        { category: 'shopping', keywords: ['buy'] },
        { category: 'news', keywords: ['headlines'] }
    ]
});

class FixedEnrichment implements IEnrichmentProvider {
    readonly name = 'fixed';

    constructor(private readonly answer: () => Promise<ExtractRefinement[] | null>) { }

    suggestExtras(): Promise<ExtractRefinement[] | null> {
        return this.answer();
    }
}

interface Harness {
    manager: TaskManager;
    driver: FakeDriver;
    clock: ManualClock;
}

const managers: TaskManager[] = [];

function createManager(site: FakeSiteOptions = SHOP_SITE, enrichment: IEnrichmentProvider = new NoopEnrichmentProvider()): Harness {
    const clock = new ManualClock(START);
    const engineClock = new InstantClock();
    const evasion = new EvasionService({ stepDelayMinMs: 0, stepDelayMaxMs: 0, random: () => 0.5, clock: engineClock });
    const driver = new FakeDriver(site);
    const engine = new ExecutionEngine(
        new SelectorResolver(engineClock),
        new ResultExtractor({ minTemplateRecords: 3, fallbackMinTextLength: 12, maxRecords: 10 }),
        evasion,
        { resolveTimeoutMs: 1000, navigationTimeoutMs: 5000, maxRecords: 10 },
        engineClock
    );
    const manager = new TaskManager({
        classifier,
        catalog,
        compiler: new PlanCompiler(),
        engine,
        pool: new SessionPool(driver, evasion, { maxSessions: 2 }),
        enrichment,
        clock
    }, { taskTimeoutMs: TASK_TIMEOUT_MS, retentionMs: RETENTION_MS });
    managers.push(manager);
    return { manager, driver, clock };
}

describe('TaskManager', () => {
    afterEach(async () => {
        await Promise.all(managers.splice(0).map(manager => manager.dispose()));
    });

    it('returns a pending snapshot at once and runs the plan in the background', async () => {
        const { manager, driver } = createManager();

        const accepted = manager.submit('buy some wool socks');

        expect(accepted.status).toBe('pending');
        expect(accepted.category).toBe('shopping');
        expect(accepted.plan.queryTerms).toEqual(['wool', 'socks']);
        expect(accepted.createdAt).toBe('2026-03-01T10:00:00.000Z');

        const done = await manager.waitFor(accepted.id);

        expect(done.status).toBe('succeeded');
        expect(done.outcomes.map(outcome => outcome.status)).toEqual(['ok', 'ok', 'ok', 'ok']);
        expect(done.results.map(record => record.url)).toEqual([
            'https://shop.test/p/1',
            'https://shop.test/p/2',
            'https://shop.test/p/3'
        ]);
        expect(done.error).toBeUndefined();
        expect(driver.sessions[0]?.actions).toContainEqual({
            kind: 'type',
            selector: '#search',
            text: 'wool socks',
            options: { delayMs: 90 }
        });
        expect(driver.closedCount).toBe(1);
    });

    it('fails the task when navigation fails', async () => {
        const { manager } = createManager();

        const { id, category } = manager.submit('weather tomorrow');
        const done = await manager.waitFor(id);

        expect(category).toBe('generic');
        expect(done.status).toBe('failed');
        expect(done.error).toEqual({
            code: 'NAVIGATION_FAILURE',
            message: 'Navigation failed to https://generic.test/: HTTP 404'
        });
        expect(done.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'skipped']);
    });

    it('fails a task that exceeds its ceiling and closes its session', async () => {
        const { manager, driver, clock } = createManager({ ...SHOP_SITE, hangOn: ['https://shop.test/'] });

        const { id } = manager.submit('buy socks');
        await flush();
        expect(manager.get(id).status).toBe('running');
        expect(clock.pendingCount).toBe(1);

        clock.advance(TASK_TIMEOUT_MS);
        const done = await manager.waitFor(id);

        expect(done.status).toBe('failed');
        expect(done.error).toEqual({
            code: 'TASK_TIMEOUT',
            message: `Task '${id}' exceeded its 5000ms ceiling`
        });
        expect(done.finishedAt).toBe('2026-03-01T10:00:05.000Z');
        expect(done.outcomes).toEqual([]);
        expect(driver.sessions[0]?.isClosed()).toBe(true);
        expect(driver.closedCount).toBe(1);
    });

    it('keeps the records found before the ceiling', async () => {
        const { manager, driver, clock } = createManager({
            pages: {
                'https://news.test/': {
                    html: resultsPage([
                        product('1', 'Harbour reopens', ''),
                        product('2', 'Bridge vote delayed', ''),
                        product('3', 'Library extends hours', '')
                    ])
                }
            },
            hangOn: ['https://news.test/archive']
        });

        const { id } = manager.submit('headlines today');
        while (manager.get(id).outcomes.length < 2) {
            await flush();
        }

        expect(manager.get(id)).toMatchObject({ status: 'running', results: [{ url: 'https://news.test/p/1' }, {}, {}] });

        clock.advance(TASK_TIMEOUT_MS);
        const done = await manager.waitFor(id);

        expect(done.status).toBe('failed');
        expect(done.error?.code).toBe('TASK_TIMEOUT');
        expect(done.outcomes.map(outcome => [outcome.action, outcome.status, outcome.recordCount])).toEqual([
            ['navigate', 'ok', undefined],
            ['extract', 'ok', 3]
        ]);
        expect(done.results.map(record => record.title)).toEqual([
            'Harbour reopens',
            'Bridge vote delayed',
            'Library extends hours'
        ]);
        expect(driver.closedCount).toBe(1);
    });

    it('starts from the page the caller names', async () => {
        const { manager, driver } = createManager({
            ...SHOP_SITE,
            pages: { ...SHOP_SITE.pages, 'https://outlet.test/': { html: SHOP_HOME } }
        });

        const accepted = manager.submit('buy socks', { startUrl: 'https://outlet.test/' });
        const done = await manager.waitFor(accepted.id);

        expect(accepted.plan.steps[0]?.params.url).toBe('https://outlet.test/');
        expect(accepted.site).toBe('test-shop');
        expect(done.status).toBe('succeeded');
        expect(driver.sessions[0]?.actions[0]).toEqual({ kind: 'navigate', url: 'https://outlet.test/' });
    });

    it('adds enrichment refinements to the extract step only', async () => {
        const { manager } = createManager(SHOP_SITE, new FixedEnrichment(async () => [{ field: 'rating', selector: '.stars' }]));

        const { id } = manager.submit('buy socks');
        const done = await manager.waitFor(id);

        expect(done.plan.steps.map(step => step.action)).toEqual(['navigate', 'type', 'waitFor', 'extract']);
        expect(done.plan.steps[3]?.refinements).toEqual([{ field: 'rating', selector: '.stars' }]);
        expect(done.plan.steps[1]?.refinements).toBeUndefined();
        expect(done.status).toBe('succeeded');
    });

    it('keeps the compiled plan when enrichment throws', async () => {
        const { manager } = createManager(SHOP_SITE, new FixedEnrichment(async () => {
            throw new Error('provider exploded');
        }));

        const { id } = manager.submit('buy socks');
        const done = await manager.waitFor(id);

        expect(done.plan).toEqual(new PlanCompiler().compile('shopping', ['socks'], catalog.get('shopping')));
        expect(done.status).toBe('succeeded');
    });

    it('lists newest first and filters by status', async () => {
        const { manager, clock } = createManager();

        const shopping = manager.submit('buy socks');
        clock.advance(10);
        const generic = manager.submit('weather tomorrow');
        await Promise.all([manager.waitFor(shopping.id), manager.waitFor(generic.id)]);

        expect(manager.list({ limit: 10 }).map(task => task.id)).toEqual([generic.id, shopping.id]);
        expect(manager.list({ limit: 1 }).map(task => task.id)).toEqual([generic.id]);
        expect(manager.list({ limit: 10, status: 'succeeded' }).map(task => task.id)).toEqual([shopping.id]);
        expect(manager.getStats()).toEqual({ pending: 0, running: 0, succeeded: 1, partially_succeeded: 0, failed: 1 });
    });

    it('throws NotFoundError for unknown ids', () => {
        const { manager } = createManager();

        expect(() => manager.get('missing')).toThrow(NotFoundError);
    });

    it('evicts finished tasks once the retention window has passed', async () => {
        const { manager, clock } = createManager();
        const { id } = manager.submit('buy socks');
        await manager.waitFor(id);

        clock.advance(RETENTION_MS - 1);
        expect(manager.sweep()).toBe(0);

        clock.advance(1);
        expect(manager.sweep()).toBe(1);
        expect(() => manager.get(id)).toThrow(NotFoundError);
    });

    it('cancels running tasks on dispose and refuses new ones', async () => {
        const { manager, driver } = createManager({ ...SHOP_SITE, hangOn: ['https://shop.test/'] });
        const { id } = manager.submit('buy socks');
        await flush();

        await manager.dispose();

        const snapshot = manager.get(id);
        expect(snapshot.status).toBe('failed');
        expect(snapshot.error).toEqual({ code: 'CANCELLED', message: 'Task cancelled' });
        expect(driver.sessions[0]?.isClosed()).toBe(true);
        expect(() => manager.submit('buy socks')).toThrow(ShuttingDownError);
        expect(() => manager.submit('buy socks')).toThrow('Task manager is shutting down');
    });
});
