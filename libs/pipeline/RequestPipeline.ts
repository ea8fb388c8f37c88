import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../observability/metrics.js';
import { recordFailure, toSpanFailure, type Span, type SpanRecorder } from '../observability/spanRecorder.js';
import { monotonicClock, type Clock } from '../time/clock.js';
import { RequestContext } from './requestContext.js';
import {
    completionLogStage,
    entryLogStage,
    recordMetricsStage,
    timingHeaderStage,
    type PipelineStage
} from './stages.js';
import type { HandlerResult, InboundRequest, PipelineResponse, Route } from './types.js';

export interface RequestPipelineOptions {
    spans: SpanRecorder;
    metrics: MetricsRegistry;
    logger: Logger;
    clock?: Clock;
    /** Run inside the span, before the handler. Defaults to the entry log. */
    preStages?: PipelineStage[];
    /** Run after the handler, in order. Defaults to metrics, completion log, timing header. */
    postStages?: PipelineStage[];
}

/**
 * Wraps every handler invocation with timing, a span, metrics and logs.
 *
 * Per request the order is fixed: entry instant, span start, entry log,
 * handler, elapsed time, metrics, completion log, timing header, span end.
 * A handler that throws still goes through every later step and is answered
 * with a generic 500.
 */
export class RequestPipeline {
    private readonly spans: SpanRecorder;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly preStages: readonly PipelineStage[];
    private readonly postStages: readonly PipelineStage[];

    constructor(options: RequestPipelineOptions) {
        this.spans = options.spans;
        this.logger = options.logger;
        this.clock = options.clock ?? monotonicClock;
        this.preStages = options.preStages ?? [entryLogStage(options.logger)];
        this.postStages = options.postStages ?? [
            recordMetricsStage(options.metrics),
            completionLogStage(options.logger),
            timingHeaderStage()
        ];
    }

    async handle(request: InboundRequest, route: Route): Promise<PipelineResponse> {
        const startedAt = this.clock.now();

        return this.spans.withSpan(route.name, async span => {
            span.setAttribute('endpoint', request.path);

            const ctx = new RequestContext(request, route.name, startedAt);
            const { traceId, spanId } = span.spanContext();
            ctx.attributes.traceId = traceId;
            ctx.attributes.spanId = spanId;

            this.runStages(this.preStages, ctx, span);

            const result = await this.invoke(route, ctx, span);
            ctx.complete(result, this.clock.now() - startedAt);

            this.runStages(this.postStages, ctx, span);

            return { status: result.status, body: result.body, headers: { ...ctx.responseHeaders } };
        });
    }

    private async invoke(route: Route, ctx: RequestContext, span: Span): Promise<HandlerResult> {
        try {
            const result = await route.handler(ctx.request, span);
            if (result.kind === 'failure') {
                recordFailure(span, result.failure);
            }
            return result;
        } catch (err) {
            const failure = toSpanFailure(err);
            const sanitized = ErrorSanitizer.sanitize(err, `route:${route.name}`);
            ctx.fail(sanitized);
            recordFailure(span, failure);

            this.logger.error({
                ...ctx.attributes,
                incidentId: sanitized.incidentId,
                method: ctx.request.method,
                path: ctx.request.path,
                at: sanitized.timestamp,
                err
            }, 'Unhandled handler failure');

            return {
                kind: 'failure',
                status: 500,
                body: {
                    error: sanitized.publicMessage,
                    incidentId: sanitized.incidentId,
                    timestamp: sanitized.timestamp
                },
                failure
            };
        }
    }

    /**
     * Telemetry stages must not cost the caller its response: a stage that
     * throws is logged and the remaining stages still run.
     */
    private runStages(stages: readonly PipelineStage[], ctx: RequestContext, span: Span): void {
        for (const stage of stages) {
            try {
                stage.run(ctx, span);
            } catch (err) {
                this.logger.warn({ ...ctx.attributes, stage: stage.name, err }, 'Pipeline stage failed');
            }
        }
    }
}
