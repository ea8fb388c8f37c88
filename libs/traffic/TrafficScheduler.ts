import { describeError } from '../errors/sanitizer.js';
import type { Logger } from '../logging/logger.js';
import { monotonicClock, sleep as realSleep, type Clock, type Sleep } from '../time/clock.js';
import type { TargetClient } from './targetClient.js';
import { TaskCancelledError, WorkerPool } from './workerPool.js';

export type TrafficPhase =
    | { readonly kind: 'steady'; readonly durationSeconds: number; readonly rate: number }
    | { readonly kind: 'burst'; readonly concurrency: number };

/** Outcome of one synthetic request. A 5xx is a response, not a failure. */
export type RequestOutcome =
    | { readonly kind: 'response'; readonly endpoint: string; readonly status: number }
    | { readonly kind: 'transport_error'; readonly endpoint: string; readonly reason: string }
    | { readonly kind: 'cancelled'; readonly endpoint: string };

export interface PhaseStatistics {
    readonly phase: TrafficPhase;
    /** Requests handed to the worker pool. */
    readonly issued: number;
    readonly responded: number;
    /** Transport failures. */
    readonly failed: number;
    /** Queued when the run was cancelled, never sent. */
    readonly cancelled: number;
    readonly byStatus: Readonly<Record<string, number>>;
    readonly elapsedSeconds: number;
}

export interface CyclePlan {
    readonly steady: { readonly durationSeconds: number; readonly rate: number };
    readonly burst: { readonly concurrency: number };
    readonly restSeconds: number;
}

export interface TrafficSchedulerOptions {
    endpoints: readonly string[];
    logger: Logger;
    /** Fixed worker count for steady phases, independent of the rate. */
    steadyWorkers?: number;
    burstWorkers?: number;
    clock?: Clock;
    sleep?: Sleep;
    random?: () => number;
    /** Receives the statistics of every completed phase. */
    onPhaseComplete?: (stats: PhaseStatistics) => void;
}

export const DEFAULT_STEADY_WORKERS = 10;
export const DEFAULT_BURST_WORKERS = 20;
export const DEFAULT_BURST_REQUESTS = 50;

/**
 * Drives synthetic traffic at a target. Individual request failures are
 * recorded in the phase statistics and never abort a phase.
 */
export class TrafficScheduler {
    private readonly endpoints: readonly string[];
    private readonly logger: Logger;
    private readonly steadyWorkers: number;
    private readonly burstWorkers: number;
    private readonly clock: Clock;
    private readonly sleep: Sleep;
    private readonly random: () => number;
    private readonly onPhaseComplete?: (stats: PhaseStatistics) => void;

    constructor(
        private readonly client: TargetClient,
        options: TrafficSchedulerOptions
    ) {
        if (options.endpoints.length === 0) {
            throw new RangeError('TrafficScheduler needs at least one endpoint');
        }
        this.endpoints = [...options.endpoints];
        this.logger = options.logger;
        this.steadyWorkers = options.steadyWorkers ?? DEFAULT_STEADY_WORKERS;
        this.burstWorkers = options.burstWorkers ?? DEFAULT_BURST_WORKERS;
        this.clock = options.clock ?? monotonicClock;
        this.sleep = options.sleep ?? realSleep;
        this.random = options.random ?? Math.random;
        this.onPhaseComplete = options.onPhaseComplete;
    }

    /**
     * Issues `rate` requests per one-second window for `durationSeconds`,
     * spacing submissions 1/rate apart. Each window drains before the
     * deadline is checked again.
     */
    async runSteady(durationSeconds: number, rate: number, signal?: AbortSignal): Promise<PhaseStatistics> {
        if (!Number.isInteger(rate) || rate < 1) {
            throw new RangeError(`Steady rate must be a positive integer, got ${rate}`);
        }
        const phase: TrafficPhase = { kind: 'steady', durationSeconds, rate };
        this.logger.info({ phase }, `Starting traffic generation for ${durationSeconds} seconds`);
        this.logger.info(`Rate: ~${rate} requests/second`);

        const startedAt = this.clock.now();
        const pool = new WorkerPool(this.steadyWorkers, signal);
        const outcomes: RequestOutcome[] = [];
        const intervalMs = 1000 / rate;

        try {
            while (this.clock.now() - startedAt < durationSeconds && !signal?.aborted) {
                const window: Promise<RequestOutcome>[] = [];
                for (let i = 0; i < rate && !signal?.aborted; i++) {
                    window.push(this.dispatch(pool, this.pickEndpoint()));
                    await this.sleep(intervalMs, signal);
                }
                outcomes.push(...(await Promise.all(window)));
            }
        } finally {
            await pool.close();
        }

        return this.finish(phase, outcomes, startedAt, 'Traffic generation completed!');
    }

    /**
     * Submits `concurrency` requests at once and returns when all have resolved.
     */
    async runBurst(concurrency: number = DEFAULT_BURST_REQUESTS, signal?: AbortSignal): Promise<PhaseStatistics> {
        const phase: TrafficPhase = { kind: 'burst', concurrency };
        this.logger.info({ phase }, 'Generating burst traffic...');

        const startedAt = this.clock.now();
        const pool = new WorkerPool(this.burstWorkers, signal);
        let outcomes: RequestOutcome[];

        try {
            outcomes = await Promise.all(
                Array.from({ length: concurrency }, () => this.dispatch(pool, this.pickEndpoint()))
            );
        } finally {
            await pool.close();
        }

        return this.finish(phase, outcomes, startedAt, 'Burst completed!');
    }

    /**
     * Steady phase, burst phase, rest; repeated until `signal` aborts. The
     * current phase lets in-flight requests drain before returning.
     * Resolves with the number of completed cycles.
     */
    async runCycles(plan: CyclePlan, signal: AbortSignal): Promise<number> {
        let cycles = 0;

        while (!signal.aborted) {
            this.logger.info({ cycle: cycles + 1 }, 'Starting traffic cycle...');

            await this.runSteady(plan.steady.durationSeconds, plan.steady.rate, signal);
            if (signal.aborted) break;

            await this.runBurst(plan.burst.concurrency, signal);
            if (signal.aborted) break;

            cycles += 1;
            this.logger.info(`Resting for ${plan.restSeconds} seconds...`);
            await this.sleep(plan.restSeconds * 1000, signal);
        }

        this.logger.info({ cycles }, 'Stopping traffic generator...');
        return cycles;
    }

    private dispatch(pool: WorkerPool, endpoint: string): Promise<RequestOutcome> {
        return pool.submit(() => this.issue(endpoint)).catch((err: unknown): RequestOutcome => {
            if (err instanceof TaskCancelledError) {
                return { kind: 'cancelled', endpoint };
            }
            throw err;
        });
    }

    private async issue(endpoint: string): Promise<RequestOutcome> {
        try {
            const status = await this.client.get(endpoint);
            this.logger.info({ endpoint, status }, `${endpoint} -> ${status}`);
            return { kind: 'response', endpoint, status };
        } catch (err) {
            const reason = describeError(err);
            this.logger.warn({ endpoint, reason }, `${endpoint} -> Error: ${reason}`);
            return { kind: 'transport_error', endpoint, reason };
        }
    }

    private pickEndpoint(): string {
        const index = Math.min(Math.floor(this.random() * this.endpoints.length), this.endpoints.length - 1);
        const endpoint = this.endpoints[index];
        if (endpoint === undefined) {
            throw new RangeError(`No endpoint at index ${index}`);
        }
        return endpoint;
    }

    private finish(phase: TrafficPhase, outcomes: readonly RequestOutcome[], startedAt: number, message: string): PhaseStatistics {
        const stats = summarize(phase, outcomes, this.clock.now() - startedAt);
        this.logger.info({ stats }, message);
        this.onPhaseComplete?.(stats);
        return stats;
    }
}

export function summarize(phase: TrafficPhase, outcomes: readonly RequestOutcome[], elapsedSeconds: number): PhaseStatistics {
    const byStatus: Record<string, number> = {};
    let responded = 0;
    let failed = 0;
    let cancelled = 0;

    for (const outcome of outcomes) {
        switch (outcome.kind) {
            case 'response':
                responded += 1;
                byStatus[String(outcome.status)] = (byStatus[String(outcome.status)] ?? 0) + 1;
                break;
            case 'transport_error':
                failed += 1;
                break;
            case 'cancelled':
                cancelled += 1;
                break;
        }
    }

    return { phase, issued: outcomes.length, responded, failed, cancelled, byStatus, elapsedSeconds };
}
