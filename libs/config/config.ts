import { z } from 'zod';
import { validate, ValidationError } from '../validation/zod-middleware.js';
import type { Logger } from '../logging/logger.js';

export class ConfigurationError extends Error {
    constructor(public readonly problems: readonly string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');

const FlagSchema = z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(v => v === 'true' || v === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const ServiceConfigSchema = z
    .object({
        HOST: z.string().min(1).default('0.0.0.0'),
        PORT: z.coerce.number().int().min(0).max(65535).default(8000),
        LOG_LEVEL: LogLevelSchema,
        SERVICE_NAME: z.string().min(1).default('demo-service'),
        OTLP_TRACES_URL: z.string().url().default('http://localhost:4318/v1/traces'),
        TRACING_ENABLED: FlagSchema,
        SLOW_MIN_SECONDS: z.coerce.number().nonnegative().default(1),
        SLOW_MAX_SECONDS: z.coerce.number().nonnegative().default(3)
    })
    .refine(c => c.SLOW_MIN_SECONDS <= c.SLOW_MAX_SECONDS, {
        message: 'SLOW_MIN_SECONDS must not exceed SLOW_MAX_SECONDS',
        path: ['SLOW_MIN_SECONDS']
    });

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export const DEFAULT_ENDPOINTS = ['/', '/health', '/slow', '/error', '/users/1', '/users/2', '/users/3'];

export const TrafficConfigSchema = z.object({
    TARGET_URL: z.string().url().default('http://localhost:8000'),
    ENDPOINTS: z
        .string()
        .default(DEFAULT_ENDPOINTS.join(','))
        .transform(raw => raw.split(',').map(e => e.trim()).filter(e => e.length > 0))
        .pipe(z.array(z.string().startsWith('/')).min(1)),
    LOG_LEVEL: LogLevelSchema,
    STEADY_DURATION_SECONDS: positiveInt(30),
    TARGET_RATE: positiveInt(2),
    STEADY_WORKERS: positiveInt(10),
    BURST_REQUESTS: positiveInt(50),
    BURST_WORKERS: positiveInt(20),
    REST_SECONDS: z.coerce.number().nonnegative().default(10),
    REQUEST_TIMEOUT_MS: positiveInt(10_000),
    READINESS_PATH: z.string().startsWith('/').default('/health'),
    READINESS_POLL_MS: positiveInt(2_000),
    READINESS_TIMEOUT_SECONDS: z.coerce.number().positive().optional()
});

export type TrafficConfig = z.infer<typeof TrafficConfigSchema>;

/**
 * Reads a configuration from environment variables. Empty strings count as unset.
 */
export function loadConfig<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    env: NodeJS.ProcessEnv,
    context: string,
    log?: Logger
): T {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    try {
        return validate(schema, present, context, log);
    } catch (err) {
        if (err instanceof ValidationError) {
            throw new ConfigurationError(err.issues.map(i => `${i.path}: ${i.message}`));
        }
        throw err;
    }
}
