/**
 * Unit Tests: Express surface
 *
 * Binds the app on an ephemeral loopback port inside the test process.
 *
 * @see libs/pipeline/expressApp.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { MetricsRegistry } from '../../libs/observability/metrics.js';
import { createApp } from '../../libs/pipeline/expressApp.js';
import { RequestPipeline } from '../../libs/pipeline/RequestPipeline.js';
import { fail, respond, type Route } from '../../libs/pipeline/types.js';
import { captureLogger, memoryTracing } from '../support/fakes.js';

describe('createApp', () => {
    const { logger, records } = captureLogger();
    const tracing = memoryTracing(logger);
    const metrics = new MetricsRegistry();
    const pipeline = new RequestPipeline({ spans: tracing.spans, metrics, logger });

    const routes: Route[] = [
        { name: 'root', method: 'GET', path: '/', handler: () => respond(200, { message: 'hi' }) },
        { name: 'item', method: 'GET', path: '/items/:itemId', handler: req => respond(200, { id: req.params['itemId'] }) },
        {
            name: 'error',
            method: 'GET',
            path: '/error',
            handler: () => fail(500, { error: 'nope' }, { name: 'SimulatedError', message: 'nope' })
        }
    ];

    let server: Server;
    let baseUrl: string;

    before(async () => {
        const app = createApp({ pipeline, routes, metrics });
        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address: AddressInfo | string | null = server.address();
        assert.ok(address && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        await tracing.shutdown();
    });

    it('serves routes through the pipeline with the timing header', async () => {
        const response = await fetch(`${baseUrl}/`);

        assert.strictEqual(response.status, 200);
        assert.deepStrictEqual(await response.json(), { message: 'hi' });
        const timing = response.headers.get('x-process-time');
        assert.ok(timing !== null && Number.isFinite(Number(timing)) && Number(timing) >= 0);
        assert.ok(records.some(r => r.msg === `Incoming request: GET ${baseUrl}/`));
    });

    it('passes path parameters and records the concrete path', async () => {
        const response = await fetch(`${baseUrl}/items/9?verbose=1`);

        assert.deepStrictEqual(await response.json(), { id: '9' });
        assert.ok(records.some(r => r.msg === `Incoming request: GET ${baseUrl}/items/9?verbose=1`));
        assert.ok(metrics.snapshot().counters.some(c => c.path === '/items/9' && c.status === 200));
    });

    it('returns the handler status for simulated failures', async () => {
        const response = await fetch(`${baseUrl}/error`);

        assert.strictEqual(response.status, 500);
        assert.deepStrictEqual(await response.json(), { error: 'nope' });
    });

    it('answers unknown paths with a pipelined 404', async () => {
        const response = await fetch(`${baseUrl}/missing`);

        assert.strictEqual(response.status, 404);
        assert.deepStrictEqual(await response.json(), { detail: 'Not Found' });
        assert.ok(response.headers.get('x-process-time') !== null);
        assert.ok(tracing.exporter.getFinishedSpans().some(s => s.name === 'not_found'));
    });

    it('exposes metrics in Prometheus text format outside the pipeline', async () => {
        const before = metrics.totalRequests();
        const response = await fetch(`${baseUrl}/metrics`);
        const text = await response.text();

        assert.strictEqual(response.status, 200);
        assert.match(response.headers.get('content-type') ?? '', /^text\/plain/);
        assert.ok(text.includes('http_requests_total{method="GET",endpoint="/",status="200"} 1\n'));
        assert.ok(text.includes('http_requests_total{method="GET",endpoint="/missing",status="404"} 1\n'));
        assert.strictEqual(metrics.totalRequests(), before);
    });
});
