import type { ZodType, ZodTypeDef } from 'zod';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';

export class ValidationError extends Error {
    constructor(
        public readonly context: string,
        public readonly issues: ReadonlyArray<{ path: string; message: string }>
    ) {
        super(`Validation failed in ${context}: ${issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ')}`);
        this.name = 'ValidationError';
    }
}

/**
 * Parses data against a schema, throwing a typed error listing every issue.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string, log: Logger = defaultLogger): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        log.warn({ context, errors: errorDetails }, "Input validation failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}
