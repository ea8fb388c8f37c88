import crypto from 'crypto';

/**
 * Wraps internal failures behind a generic public message and a unique
 * incident ID that ties the caller-visible response to the error log.
 */

/** APP: request handling. TELEMETRY: trace sink failures, never surfaced to callers. */
export type ErrorCategory = 'APP' | 'TELEMETRY';

export class ServiceError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ErrorCategory = 'APP',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'ServiceError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;
    }
}

export const INTERNAL_ERROR_MESSAGE = 'Internal Server Error';

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized ServiceError.
     */
    sanitize: (err: unknown, contextLabel: string): ServiceError => {
        if (err instanceof ServiceError) return err;

        let originalErrorName: string | undefined;
        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorName = err.name;
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new ServiceError(
            INTERNAL_ERROR_MESSAGE,
            { originalName: originalErrorName, originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'APP',
            { cause: err, contextLabel }
        );
    }
};

/**
 * Human-readable reason for a failure of unknown shape.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
        return `${err.message}${cause}`;
    }
    return String(err);
}
