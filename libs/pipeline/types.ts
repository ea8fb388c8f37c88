import type { Span, SpanFailure } from '../observability/spanRecorder.js';

export interface InboundRequest {
    readonly method: string;
    readonly path: string;
    /** Full request URL, as logged on entry. */
    readonly url: string;
    readonly params: Readonly<Record<string, string>>;
}

/**
 * What a handler produced. A `failure` is a deliberate application-level
 * error: the request still completes normally, and the pipeline records
 * the failure on the span.
 */
export type HandlerResult =
    | { readonly kind: 'response'; readonly status: number; readonly body: unknown }
    | { readonly kind: 'failure'; readonly status: number; readonly body: unknown; readonly failure: SpanFailure };

export type RouteHandler = (request: InboundRequest, span: Span) => HandlerResult | Promise<HandlerResult>;

export interface Route {
    /** Span name for requests served by this route. */
    readonly name: string;
    readonly method: 'GET';
    /** Express path pattern, e.g. `/users/:userId`. */
    readonly path: string;
    readonly handler: RouteHandler;
}

export interface PipelineResponse {
    readonly status: number;
    readonly body: unknown;
    readonly headers: Readonly<Record<string, string>>;
}

export const respond = (status: number, body: unknown): HandlerResult => ({ kind: 'response', status, body });

export const fail = (status: number, body: unknown, failure: SpanFailure): HandlerResult => ({
    kind: 'failure',
    status,
    body,
    failure
});
