import { describeError } from '../errors/sanitizer.js';
import type { Logger } from '../logging/logger.js';
import { monotonicClock, sleep as realSleep, type Clock, type Sleep } from '../time/clock.js';

export class ReadinessTimeoutError extends Error {
    constructor(public readonly attempts: number, public readonly timeoutMs: number) {
        super(`Service not ready after ${attempts} attempts within ${timeoutMs}ms`);
        this.name = 'ReadinessTimeoutError';
    }
}

export class ReadinessAbortedError extends Error {
    constructor(public readonly attempts: number) {
        super(`Readiness wait aborted after ${attempts} attempts`);
        this.name = 'ReadinessAbortedError';
    }
}

/** Resolves with a status code; rejects when the service cannot be reached. */
export type ReadinessProbe = () => Promise<number>;

export interface ReadinessOptions {
    pollIntervalMs: number;
    /** Unset means wait forever. */
    timeoutMs?: number;
    expectedStatus?: number;
    logger: Logger;
    signal?: AbortSignal;
    clock?: Clock;
    sleep?: Sleep;
}

/**
 * Polls `probe` until it answers with the expected status and resolves with
 * the number of attempts made. Unreachable targets and other statuses count
 * as not ready and are retried after the poll interval.
 *
 * Without a timeout this never gives up; only the signal stops it.
 */
export async function waitUntilReady(probe: ReadinessProbe, options: ReadinessOptions): Promise<number> {
    const { pollIntervalMs, timeoutMs, logger, signal } = options;
    const expectedStatus = options.expectedStatus ?? 200;
    const clock = options.clock ?? monotonicClock;
    const sleep = options.sleep ?? realSleep;
    const startedAt = clock.now();

    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) {
            throw new ReadinessAbortedError(attempt - 1);
        }

        try {
            const status = await probe();
            if (status === expectedStatus) {
                logger.info({ attempts: attempt }, 'Service is ready!');
                return attempt;
            }
            logger.info({ attempt, status }, 'Service not ready, waiting...');
        } catch (err) {
            logger.info({ attempt, reason: describeError(err) }, 'Service not ready, waiting...');
        }

        if (timeoutMs !== undefined && (clock.now() - startedAt) * 1000 >= timeoutMs) {
            throw new ReadinessTimeoutError(attempt, timeoutMs);
        }

        await sleep(pollIntervalMs, signal);
    }
}
