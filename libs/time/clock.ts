import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';

/**
 * Monotonic time source, in seconds. Only differences between readings are meaningful.
 */
export interface Clock {
    now(): number;
}

export const monotonicClock: Clock = {
    now: () => performance.now() / 1000
};

/**
 * Waits `ms` milliseconds. Resolves early, without throwing, once `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
    if (signal?.aborted) return;
    try {
        await delay(ms, undefined, { signal });
    } catch (err) {
        if (signal?.aborted) return;
        throw err;
    }
};
