import { AsyncLocalStorage } from 'node:async_hooks';
import { ROOT_CONTEXT, SpanStatusCode, trace, type Attributes, type Span, type Tracer } from '@opentelemetry/api';

export type { Span } from '@opentelemetry/api';

/**
 * Failure description recorded on a span as an `exception` event.
 */
export interface SpanFailure {
    name: string;
    message: string;
}

/**
 * Starts spans parented on whichever span is active in the calling async
 * context. The active span lives in AsyncLocalStorage owned by this recorder,
 * so concurrent requests never see each other's spans.
 */
export class SpanRecorder {
    private readonly active = new AsyncLocalStorage<Span>();

    constructor(private readonly tracer: Tracer) { }

    startSpan(name: string, attributes?: Attributes): Span {
        const parent = this.active.getStore();
        const parentContext = parent ? trace.setSpan(ROOT_CONTEXT, parent) : ROOT_CONTEXT;
        return this.tracer.startSpan(name, { attributes }, parentContext);
    }

    activeSpan(): Span | undefined {
        return this.active.getStore();
    }

    /**
     * Runs `fn` with a new span active and ends that span exactly once,
     * whether `fn` returns or throws. Thrown errors are recorded, then rethrown.
     */
    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: Attributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await this.active.run(span, () => fn(span));
        } catch (err) {
            recordFailure(span, toSpanFailure(err));
            throw err;
        } finally {
            span.end();
        }
    }
}

export function recordFailure(span: Span, failure: SpanFailure): void {
    span.recordException({ name: failure.name, message: failure.message });
    span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
}

export function toSpanFailure(err: unknown): SpanFailure {
    if (err instanceof Error) {
        return { name: err.name, message: err.message };
    }
    return { name: 'Error', message: String(err) };
}
