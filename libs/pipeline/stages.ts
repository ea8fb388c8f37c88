import type { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../observability/metrics.js';
import type { Span } from '../observability/spanRecorder.js';
import type { RequestContext } from './requestContext.js';

/**
 * One step of the request pipeline. Stages read the context and append to
 * it; they never end the span or produce the response.
 */
export interface PipelineStage {
    readonly name: string;
    run(ctx: RequestContext, span: Span): void;
}

export const PROCESS_TIME_HEADER = 'X-Process-Time';

export const formatDuration = (seconds: number): string => `${seconds.toFixed(4)}s`;

export function entryLogStage(logger: Logger): PipelineStage {
    return {
        name: 'entry-log',
        run(ctx) {
            const { method, url } = ctx.request;
            logger.info({ ...ctx.attributes, method, url }, `Incoming request: ${method} ${url}`);
        }
    };
}

export function recordMetricsStage(metrics: MetricsRegistry): PipelineStage {
    return {
        name: 'record-metrics',
        run(ctx) {
            metrics.increment(ctx.request.method, ctx.request.path, ctx.status);
            metrics.observeLatency(ctx.elapsedSeconds);
        }
    };
}

export function completionLogStage(logger: Logger): PipelineStage {
    return {
        name: 'completion-log',
        run(ctx) {
            const { method, path } = ctx.request;
            const status = ctx.status;
            logger.info(
                { ...ctx.attributes, method, path, status, durationSeconds: ctx.elapsedSeconds, incidentId: ctx.error?.incidentId },
                `Request completed: ${method} ${path} - Status: ${status} - Duration: ${formatDuration(ctx.elapsedSeconds)}`
            );
        }
    };
}

export function timingHeaderStage(header: string = PROCESS_TIME_HEADER): PipelineStage {
    return {
        name: 'timing-header',
        run(ctx) {
            ctx.responseHeaders[header] = String(ctx.elapsedSeconds);
        }
    };
}
