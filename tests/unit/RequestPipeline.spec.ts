/**
 * Unit Tests: RequestPipeline
 *
 * Ordering of observability side effects around one request, and the
 * accounting invariants across many.
 *
 * @see libs/pipeline/RequestPipeline.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SpanStatusCode } from '@opentelemetry/api';
import { MetricsRegistry } from '../../libs/observability/metrics.js';
import { RequestPipeline } from '../../libs/pipeline/RequestPipeline.js';
import { recordMetricsStage, timingHeaderStage, type PipelineStage } from '../../libs/pipeline/stages.js';
import { fail, respond, type InboundRequest, type Route, type RouteHandler } from '../../libs/pipeline/types.js';
import { captureLogger, FakeClock, LEVEL, memoryTracing } from '../support/fakes.js';

function setup(postStages?: PipelineStage[]) {
    const { logger, records } = captureLogger();
    const tracing = memoryTracing(logger);
    const metrics = new MetricsRegistry();
    const clock = new FakeClock(100);
    const pipeline = new RequestPipeline({ spans: tracing.spans, metrics, logger, clock, postStages });
    return { pipeline, metrics, tracing, records, clock, logger };
}

const get = (path: string): InboundRequest => ({ method: 'GET', path, url: `http://localhost${path}`, params: {} });

const route = (name: string, handler: RouteHandler): Route => ({ name, method: 'GET', path: '/x', handler });

describe('RequestPipeline', () => {
    it('orders entry log, handler, completion log, timing header and span end', async () => {
        const { pipeline, tracing, records, clock, logger } = setup();
        const seenByHandler: boolean[] = [];

        const response = await pipeline.handle(get('/x'), route('x_handler', (_req, span) => {
            seenByHandler.push(span.isRecording());
            logger.info('handler ran');
            clock.advance(0.25);
            return respond(200, { ok: true });
        }));

        assert.deepStrictEqual(records.map(r => r.msg), [
            'Incoming request: GET http://localhost/x',
            'handler ran',
            'Request completed: GET /x - Status: 200 - Duration: 0.2500s'
        ]);
        assert.deepStrictEqual(seenByHandler, [true]);
        assert.deepStrictEqual(response, { status: 200, body: { ok: true }, headers: { 'X-Process-Time': '0.25' } });

        const spans = tracing.exporter.getFinishedSpans();
        assert.strictEqual(spans.length, 1);
        assert.strictEqual(spans[0]?.name, 'x_handler');
        assert.strictEqual(spans[0]?.attributes['endpoint'], '/x');
    });

    it('closes the span only after every post-handler stage ran', async () => {
        const openDuringStage: boolean[] = [];
        const probe: PipelineStage = {
            name: 'probe',
            run: (_ctx, span) => {
                openDuringStage.push(span.isRecording());
            }
        };
        const { pipeline, metrics } = setup([recordMetricsStage(new MetricsRegistry()), probe]);

        await pipeline.handle(get('/x'), route('x', () => respond(204, null)));

        assert.deepStrictEqual(openDuringStage, [true]);
        assert.strictEqual(metrics.totalRequests(), 0);
    });

    it('correlates log records with the request span', async () => {
        const { pipeline, tracing, records } = setup();

        await pipeline.handle(get('/x'), route('x', () => respond(200, {})));

        const span = tracing.exporter.getFinishedSpans()[0];
        assert.ok(span);
        for (const record of records) {
            assert.strictEqual(record.traceId, span.spanContext().traceId);
            assert.strictEqual(record.spanId, span.spanContext().spanId);
        }
    });

    it('lets handlers refine span attributes', async () => {
        const { pipeline, tracing } = setup();

        await pipeline.handle(get('/x/7'), route('x', (_req, span) => {
            span.setAttribute('endpoint', '/x/{id}');
            span.setAttribute('item_id', 7);
            return respond(200, {});
        }));

        const attributes = tracing.exporter.getFinishedSpans()[0]?.attributes;
        assert.strictEqual(attributes?.['endpoint'], '/x/{id}');
        assert.strictEqual(attributes?.['item_id'], 7);
    });

    it('counts every request once and observes every latency once', async () => {
        const { pipeline, metrics } = setup();
        const ok = route('ok', () => respond(200, {}));
        const simulated = route('simulated', () => fail(500, {}, { name: 'SimulatedError', message: 'Simulated error' }));
        const broken = route('broken', () => {
            throw new Error('defect');
        });

        await Promise.all([
            pipeline.handle(get('/'), ok),
            pipeline.handle(get('/'), ok),
            pipeline.handle(get('/health'), ok),
            pipeline.handle(get('/error'), simulated),
            pipeline.handle(get('/error'), simulated),
            pipeline.handle(get('/boom'), broken),
            pipeline.handle(get('/users/1'), ok)
        ]);

        const snapshot = metrics.snapshot();
        assert.strictEqual(metrics.totalRequests(), 7);
        assert.strictEqual(snapshot.histogram.count, 7);
        assert.deepStrictEqual(
            snapshot.counters.filter(c => c.path === '/').map(c => [c.status, c.value]),
            [[200, 2]]
        );
        assert.deepStrictEqual(
            snapshot.counters.filter(c => c.path === '/error').map(c => [c.status, c.value]),
            [[500, 2]]
        );
    });

    describe('simulated application errors', () => {
        it('completes the request and records the exception on the span', async () => {
            const { pipeline, metrics, tracing, records } = setup();

            const response = await pipeline.handle(get('/error'), route('error_endpoint', () =>
                fail(500, { error: 'Simulated server error' }, { name: 'SimulatedError', message: 'Simulated error' })
            ));

            assert.strictEqual(response.status, 500);
            assert.deepStrictEqual(response.body, { error: 'Simulated server error' });
            assert.strictEqual(response.headers['X-Process-Time'], '0');

            const span = tracing.exporter.getFinishedSpans()[0];
            assert.ok(span);
            assert.strictEqual(span.status.code, SpanStatusCode.ERROR);
            assert.strictEqual(span.events[0]?.name, 'exception');
            assert.strictEqual(span.events[0]?.attributes?.['exception.type'], 'SimulatedError');
            assert.strictEqual(span.events[0]?.attributes?.['exception.message'], 'Simulated error');

            assert.deepStrictEqual(metrics.snapshot().counters, [{ method: 'GET', path: '/error', status: 500, value: 1 }]);
            assert.ok(records.every(r => r.level === LEVEL.info));
            assert.strictEqual(records.at(-1)?.msg, 'Request completed: GET /error - Status: 500 - Duration: 0.0000s');
            assert.strictEqual(records.at(-1)?.incidentId, undefined);
        });
    });

    describe('unexpected handler failures', () => {
        it('answers a generic 500 after metrics, logs, header and span close', async () => {
            const { pipeline, metrics, tracing, records, clock } = setup();

            const response = await pipeline.handle(get('/boom'), route('boom', () => {
                clock.advance(0.5);
                throw new TypeError('cannot read properties of undefined');
            }));

            assert.strictEqual(response.status, 500);
            assert.strictEqual(response.headers['X-Process-Time'], '0.5');
            const body = response.body;
            assert.ok(typeof body === 'object' && body !== null && 'incidentId' in body && 'error' in body);
            assert.strictEqual(body.error, 'Internal Server Error');

            const errorLog = records.find(r => r.level === LEVEL.error);
            assert.ok(errorLog);
            assert.strictEqual(errorLog.msg, 'Unhandled handler failure');
            assert.strictEqual(errorLog.method, 'GET');
            assert.strictEqual(errorLog.path, '/boom');
            assert.strictEqual(errorLog.incidentId, body.incidentId);
            assert.ok(!Number.isNaN(Date.parse(String(errorLog.at))));
            assert.deepStrictEqual(
                records.map(r => r.msg),
                ['Incoming request: GET http://localhost/boom', 'Unhandled handler failure', 'Request completed: GET /boom - Status: 500 - Duration: 0.5000s']
            );
            assert.strictEqual(records.at(-1)?.incidentId, body.incidentId);

            assert.deepStrictEqual(metrics.snapshot().counters, [{ method: 'GET', path: '/boom', status: 500, value: 1 }]);

            const spans = tracing.exporter.getFinishedSpans();
            assert.strictEqual(spans.length, 1);
            assert.strictEqual(spans[0]?.events[0]?.attributes?.['exception.type'], 'TypeError');
        });

        it('handles async rejections the same way', async () => {
            const { pipeline, metrics } = setup();

            const response = await pipeline.handle(get('/later'), route('later', async () => {
                await Promise.resolve();
                throw new Error('late failure');
            }));

            assert.strictEqual(response.status, 500);
            assert.strictEqual(metrics.totalRequests(), 1);
        });
    });

    it('keeps producing responses when a telemetry stage throws', async () => {
        const metrics = new MetricsRegistry();
        const broken: PipelineStage = {
            name: 'broken-sink',
            run: () => {
                throw new Error('sink offline');
            }
        };
        const { pipeline, records } = setup([broken, recordMetricsStage(metrics), timingHeaderStage('X-Elapsed')]);

        const response = await pipeline.handle(get('/x'), route('x', () => respond(200, 'fine')));

        assert.strictEqual(response.status, 200);
        assert.strictEqual(response.body, 'fine');
        assert.strictEqual(response.headers['X-Elapsed'], '0');
        assert.strictEqual(metrics.totalRequests(), 1);
        const warning = records.find(r => r.level === LEVEL.warn);
        assert.strictEqual(warning?.msg, 'Pipeline stage failed');
        assert.strictEqual(warning?.stage, 'broken-sink');
    });
});
