import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import type { Express } from 'express';
import {
    EvasionService,
    ExecutionEngine,
    IntentClassifier,
    NoopEnrichmentProvider,
    PlanCompiler,
    ResultExtractor,
    SelectorResolver,
    SessionPool,
    SiteCatalog
} from '@webpilot/shared';
import { createApp } from '../../../packages/core/src/api/server.js';
import { TaskManager } from '../../../packages/core/src/services/task-manager.js';
import { FakeDriver, InstantClock } from '../../utils/fake-browser.js';
import { SHOP_HOME, product, resultsPage, shopDescriptor } from '../../utils/fixtures.js';

const UNKNOWN_ID = '0b7c4a52-3f1e-4d7a-9a51-6c2f0e8d1b34';

function createTasks(): { tasks: TaskManager; pool: SessionPool } {
    const clock = new InstantClock();
    const evasion = new EvasionService({ stepDelayMinMs: 0, stepDelayMaxMs: 0, random: () => 0.5, clock });
    const driver = new FakeDriver({
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
    });
    const pool = new SessionPool(driver, evasion, { maxSessions: 2 });
    const tasks = new TaskManager({
        classifier: new IntentClassifier({ stopWords: [], rules: [{ category: 'shopping', keywords: ['buy'] }] }),
        catalog: new SiteCatalog([shopDescriptor(), shopDescriptor({ category: 'generic', name: 'test-generic' })]),
        compiler: new PlanCompiler(),
        engine: new ExecutionEngine(
            new SelectorResolver(clock),
            new ResultExtractor({ minTemplateRecords: 3, fallbackMinTextLength: 12, maxRecords: 10 }),
            evasion,
            { resolveTimeoutMs: 1000, navigationTimeoutMs: 5000, maxRecords: 10 },
            clock
        ),
        pool,
        enrichment: new NoopEnrichmentProvider()
    }, { taskTimeoutMs: 60000, retentionMs: 60000 });
    return { tasks, pool };
}

async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
    const server = await new Promise<Server>(resolve => {
        const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
}

describe('Task API', () => {
    let server: Server;
    let baseUrl: string;
    let tasks: TaskManager;

    beforeAll(async () => {
        const created = createTasks();
        tasks = created.tasks;
        ({ server, baseUrl } = await listen(createApp(created)));
    });

    afterAll(async () => {
        await tasks.dispose();
        await close(server);
    });

    const post = (path: string, body: unknown, headers: Record<string, string> = {}) => fetch(`${baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body)
    });

    describe('POST /api/v1/tasks', () => {
        it('should accept a goal with 202 and a status url', async () => {
            const response = await post('/api/v1/tasks', { goal: 'buy socks' }, { 'X-Request-ID': 'req-submit-1' });
            const body: unknown = await response.json();

            expect(response.status).toBe(202);
            expect(response.headers.get('x-request-id')).toBe('req-submit-1');
            expect(body).toMatchObject({
                success: true,
                data: { status: 'pending' },
                meta: { requestId: 'req-submit-1' }
            });

            const [task] = tasks.list({ limit: 1 });
            expect(body).toMatchObject({ data: { taskId: task?.id, statusUrl: `/api/v1/tasks/${task?.id}` } });
        });

        it('should reject an empty goal', async () => {
            const response = await post('/api/v1/tasks', { goal: '   ' });
            const body: unknown = await response.json();

            expect(response.status).toBe(400);
            expect(body).toMatchObject({
                success: false,
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Request validation failed',
                    details: [{ field: 'goal', message: 'Goal must not be empty', code: 'too_small' }]
                }
            });
        });

        it('should start from a caller-supplied url', async () => {
            const response = await post('/api/v1/tasks', { goal: 'buy socks', url: 'https://outlet.test/socks' });
            const body: unknown = await response.json();

            expect(response.status).toBe(202);
            const task = tasks.list({ limit: 100 }).find(snapshot => snapshot.plan.steps[0]?.params.url === 'https://outlet.test/socks');
            expect(task).toBeDefined();
            expect(body).toMatchObject({ data: { taskId: task?.id } });
        });

        it('should reject a url that is not http', async () => {
            const response = await post('/api/v1/tasks', { goal: 'buy socks', url: 'ftp://outlet.test/socks' });
            const body: unknown = await response.json();

            expect(response.status).toBe(400);
            expect(body).toMatchObject({ error: { details: [{ field: 'url', message: 'Url must use http or https' }] } });
        });

        it('should reject a relative url', async () => {
            const response = await post('/api/v1/tasks', { goal: 'buy socks', url: '/socks' });
            const body: unknown = await response.json();

            expect(response.status).toBe(400);
            expect(body).toMatchObject({
                error: { details: expect.arrayContaining([expect.objectContaining({ field: 'url', message: 'Url must be absolute' })]) }
            });
        });

        it('should reject a missing goal', async () => {
            const response = await post('/api/v1/tasks', {});
            const body: unknown = await response.json();

            expect(response.status).toBe(400);
            expect(body).toMatchObject({ error: { details: [{ field: 'goal', message: 'Goal is required' }] } });
        });
    });

    describe('GET /api/v1/tasks/:id', () => {
        it('should return the finished snapshot', async () => {
            const accepted = tasks.submit('buy socks');
            await tasks.waitFor(accepted.id);

            const response = await fetch(`${baseUrl}/api/v1/tasks/${accepted.id}`);
            const body: unknown = await response.json();

            expect(response.status).toBe(200);
            expect(body).toMatchObject({
                success: true,
                data: {
                    id: accepted.id,
                    goal: { text: 'buy socks' },
                    category: 'shopping',
                    site: 'test-shop',
                    status: 'succeeded',
                    results: [
                        { url: 'https://shop.test/p/1', title: 'Wool socks', price: '$9' },
                        { url: 'https://shop.test/p/2', title: 'Cotton socks', price: '$5' },
                        { url: 'https://shop.test/p/3', title: 'Hiking socks', price: '$14' }
                    ]
                }
            });
        });

        it('should return 404 for an unknown id', async () => {
            const response = await fetch(`${baseUrl}/api/v1/tasks/${UNKNOWN_ID}`);
            const body: unknown = await response.json();

            expect(response.status).toBe(404);
            expect(body).toMatchObject({ error: { code: 'NOT_FOUND', message: `Task not found: ${UNKNOWN_ID}` } });
        });

        it('should return 404 for a malformed id', async () => {
            const response = await fetch(`${baseUrl}/api/v1/tasks/not-a-task`);
            const body: unknown = await response.json();

            expect(response.status).toBe(404);
            expect(body).toMatchObject({ error: { code: 'NOT_FOUND', message: 'Task not found: not-a-task' } });
        });
    });

    describe('GET /api/v1/tasks', () => {
        it('should honour the limit', async () => {
            tasks.submit('buy hats');
            tasks.submit('buy gloves');

            const response = await fetch(`${baseUrl}/api/v1/tasks?limit=2`);
            const body: unknown = await response.json();

            expect(response.status).toBe(200);
            expect(body).toMatchObject({ success: true, meta: { count: 2 } });
        });

        it('should reject an out-of-range limit', async () => {
            const response = await fetch(`${baseUrl}/api/v1/tasks?limit=0`);

            expect(response.status).toBe(400);
        });
    });

    it('should report pool and task stats on /health', async () => {
        const response = await fetch(`${baseUrl}/health`);
        const body: unknown = await response.json();

        expect(response.status).toBe(200);
        expect(body).toMatchObject({ status: 'healthy', sessionPool: { maxSessions: 2 } });
    });

    it('should expose task counters on /metrics', async () => {
        const response = await fetch(`${baseUrl}/metrics`);

        expect(response.status).toBe(200);
        expect(await response.text()).toContain('automation_tasks_total');
    });

    it('should return 404 for unknown routes', async () => {
        const response = await fetch(`${baseUrl}/api/v1/unknown`);
        const body: unknown = await response.json();

        expect(response.status).toBe(404);
        expect(body).toMatchObject({ error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/unknown not found' } });
    });
});

describe('Task API while stopping', () => {
    it('should answer 503 once the task manager has stopped', async () => {
        const created = createTasks();
        await created.tasks.dispose();
        const { server, baseUrl } = await listen(createApp(created));

        try {
            const response = await fetch(`${baseUrl}/api/v1/tasks`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ goal: 'buy socks' })
            });
            const body: unknown = await response.json();

            expect(response.status).toBe(503);
            expect(body).toMatchObject({
                success: false,
                error: { code: 'SHUTTING_DOWN', message: 'Task manager is shutting down' }
            });
        } finally {
            await close(server);
        }
    });
});
