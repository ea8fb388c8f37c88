import { Resource } from '@opentelemetry/resources';
import {
    BasicTracerProvider,
    BatchSpanProcessor,
    SimpleSpanProcessor,
    type SpanExporter
} from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import type { Logger } from '../logging/logger.js';
import { GuardedSpanExporter } from './guardedExporter.js';
import { SpanRecorder } from './spanRecorder.js';

export interface TracingOptions {
    serviceName: string;
    logger: Logger;
    /** Trace sink. Without one, spans are created but never exported. */
    exporter?: SpanExporter;
    /** Export each span as it ends instead of batching. */
    immediate?: boolean;
}

export interface Tracing {
    readonly provider: BasicTracerProvider;
    readonly spans: SpanRecorder;
    /** Flushes pending spans and releases the exporter. Never rejects. */
    shutdown(): Promise<void>;
}

export function createTracing(options: TracingOptions): Tracing {
    const provider = new BasicTracerProvider({
        resource: new Resource({ [ATTR_SERVICE_NAME]: options.serviceName })
    });

    if (options.exporter) {
        const guarded = new GuardedSpanExporter(options.exporter, options.logger);
        provider.addSpanProcessor(
            options.immediate ? new SimpleSpanProcessor(guarded) : new BatchSpanProcessor(guarded)
        );
    }

    const spans = new SpanRecorder(provider.getTracer(options.serviceName));

    return {
        provider,
        spans,
        async shutdown() {
            try {
                await provider.shutdown();
            } catch (err) {
                options.logger.warn({ err }, 'Tracing shutdown failed, pending spans dropped');
            }
        }
    };
}
