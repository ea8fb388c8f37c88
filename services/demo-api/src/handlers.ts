import { z } from 'zod';
import type { Logger } from '../../../libs/logging/logger.js';
import type { SpanRecorder } from '../../../libs/observability/spanRecorder.js';
import { fail, respond, type Route } from '../../../libs/pipeline/types.js';
import { sleep as realSleep, type Sleep } from '../../../libs/time/clock.js';

export interface DemoRouteOptions {
    spans: SpanRecorder;
    logger: Logger;
    slowDelaySeconds: { min: number; max: number };
    random?: () => number;
    sleep?: Sleep;
    now?: () => Date;
}

const UserParamsSchema = z.object({
    userId: z.string().regex(/^-?\d+$/, 'value is not a valid integer').transform(Number)
});

/**
 * The demo handler set: plain responses, a randomized slow path, a
 * simulated server error and a parameterized user lookup.
 */
export function createDemoRoutes(options: DemoRouteOptions): Route[] {
    const { spans, logger } = options;
    const random = options.random ?? Math.random;
    const sleep = options.sleep ?? realSleep;
    const timestamp = () => (options.now ?? (() => new Date()))().toISOString();

    return [
        {
            name: 'root_handler',
            method: 'GET',
            path: '/',
            handler: (_req, span) => {
                span.setAttribute('endpoint', '/');
                logger.info('Root endpoint accessed');
                return respond(200, { message: 'Hello World!', timestamp: timestamp() });
            }
        },
        {
            name: 'health_check',
            method: 'GET',
            path: '/health',
            handler: (_req, span) => {
                span.setAttribute('endpoint', '/health');
                logger.info('Health check requested');
                return respond(200, { status: 'healthy', timestamp: timestamp() });
            }
        },
        {
            name: 'slow_endpoint',
            method: 'GET',
            path: '/slow',
            handler: async (_req, span) => {
                const { min, max } = options.slowDelaySeconds;
                const delay = min + random() * (max - min);
                span.setAttribute('delay_seconds', delay);
                span.setAttribute('endpoint', '/slow');

                logger.info({ delay }, `Slow endpoint called, simulating ${delay.toFixed(2)}s delay`);
                await sleep(delay * 1000);
                logger.info('Slow endpoint completed');

                return respond(200, { message: 'This was slow!', delay, timestamp: timestamp() });
            }
        },
        {
            name: 'error_endpoint',
            method: 'GET',
            path: '/error',
            handler: (_req, span) => {
                span.setAttribute('endpoint', '/error');
                logger.error('Error endpoint accessed - simulating server error');
                return fail(
                    500,
                    { error: 'Simulated server error', timestamp: timestamp() },
                    { name: 'SimulatedError', message: 'Simulated error' }
                );
            }
        },
        {
            name: 'get_user',
            method: 'GET',
            path: '/users/:userId',
            handler: async (req, span) => {
                span.setAttribute('endpoint', '/users/{user_id}');

                const parsed = UserParamsSchema.safeParse(req.params);
                if (!parsed.success) {
                    const detail = parsed.error.issues.map(i => ({ loc: ['path', 'user_id'], msg: i.message }));
                    logger.warn({ params: req.params }, 'Rejected user lookup with invalid id');
                    return respond(422, { detail });
                }

                const userId = parsed.data.userId;
                span.setAttribute('user_id', userId);
                logger.info(`Fetching user ${userId}`);

                const user = await spans.withSpan('user_lookup', lookup => {
                    lookup.setAttribute('user_id', userId);
                    return {
                        id: userId,
                        name: `User ${userId}`,
                        email: `user${userId}@example.com`,
                        timestamp: timestamp()
                    };
                });

                logger.info(`User ${userId} data retrieved successfully`);
                return respond(200, user);
            }
        }
    ];
}
