import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { PROMETHEUS_CONTENT_TYPE, type MetricsRegistry } from '../observability/metrics.js';
import type { RequestPipeline } from './RequestPipeline.js';
import { respond, type InboundRequest, type Route } from './types.js';

export interface AppOptions {
    pipeline: RequestPipeline;
    routes: readonly Route[];
    metrics: MetricsRegistry;
    /** Serves every request no route matched. */
    notFound?: Route;
}

export const notFoundRoute: Route = {
    name: 'not_found',
    method: 'GET',
    path: '*',
    handler: () => respond(404, { detail: 'Not Found' })
};

function toInboundRequest(req: Request): InboundRequest {
    return {
        method: req.method,
        path: req.path,
        url: `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`,
        params: { ...req.params }
    };
}

function serve(pipeline: RequestPipeline, route: Route) {
    return (req: Request, res: Response, next: NextFunction): void => {
        pipeline
            .handle(toInboundRequest(req), route)
            .then(response => {
                res.status(response.status).set(response.headers).json(response.body);
            })
            .catch(next);
    };
}

/**
 * Express surface of the service: each route runs through the pipeline,
 * `/metrics` exposes the registry, anything else is a pipelined 404.
 */
export function createApp(options: AppOptions): Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/metrics', (_req, res) => {
        res.type(PROMETHEUS_CONTENT_TYPE).send(options.metrics.serialize());
    });

    for (const route of options.routes) {
        app.get(route.path, serve(options.pipeline, route));
    }

    app.use(serve(options.pipeline, options.notFound ?? notFoundRoute));

    return app;
}
