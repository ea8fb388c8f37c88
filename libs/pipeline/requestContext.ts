import type { ServiceError } from '../errors/sanitizer.js';
import type { HandlerResult, InboundRequest } from './types.js';

export type CorrelationValue = string | number | boolean;

/**
 * Per-invocation state of one request. Owned by the pipeline invocation that
 * created it and never shared across requests.
 *
 * The outcome and the error are each written at most once.
 */
export class RequestContext {
    /** Correlation fields merged into every log record for this request. */
    public readonly attributes: Record<string, CorrelationValue> = {};
    public readonly responseHeaders: Record<string, string> = {};

    private outcome?: { result: HandlerResult; elapsedSeconds: number };
    private failure?: ServiceError;

    constructor(
        public readonly request: InboundRequest,
        public readonly routeName: string,
        public readonly startedAt: number
    ) { }

    complete(result: HandlerResult, elapsedSeconds: number): void {
        if (this.outcome) {
            throw new Error(`Request outcome already recorded for ${this.request.method} ${this.request.path}`);
        }
        this.outcome = { result, elapsedSeconds };
    }

    fail(error: ServiceError): void {
        if (this.failure) {
            throw new Error(`Request error already recorded for ${this.request.method} ${this.request.path}`);
        }
        this.failure = error;
    }

    get error(): ServiceError | undefined {
        return this.failure;
    }

    get status(): number {
        return this.requireOutcome().result.status;
    }

    get elapsedSeconds(): number {
        return this.requireOutcome().elapsedSeconds;
    }

    private requireOutcome(): { result: HandlerResult; elapsedSeconds: number } {
        if (!this.outcome) {
            throw new Error(`Request ${this.request.method} ${this.request.path} has not completed`);
        }
        return this.outcome;
    }
}
