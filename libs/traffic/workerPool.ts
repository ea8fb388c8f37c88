export class TaskCancelledError extends Error {
    constructor() {
        super('Task cancelled before it started');
        this.name = 'TaskCancelledError';
    }
}

interface Job {
    run(): Promise<void>;
    cancel(): void;
}

/**
 * Bounded task queue drained by a fixed number of worker loops, so at most
 * `size` tasks run at once however many are submitted.
 *
 * Workers check the abort signal between draws. Once it fires, running tasks
 * finish, queued tasks reject with TaskCancelledError and workers exit.
 */
export class WorkerPool {
    private readonly queue: Job[] = [];
    private readonly idleWorkers: Array<() => void> = [];
    private readonly workers: Promise<void>[];
    private closed = false;
    private readonly onAbort = () => {
        this.cancelQueued();
        this.wakeAll();
    };

    constructor(
        public readonly size: number,
        private readonly signal?: AbortSignal
    ) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
        }
        signal?.addEventListener('abort', this.onAbort, { once: true });
        this.workers = Array.from({ length: size }, () => this.work());
    }

    submit<T>(task: () => Promise<T>): Promise<T> {
        if (this.closed || this.signal?.aborted) {
            return Promise.reject(new TaskCancelledError());
        }

        return new Promise<T>((resolve, reject) => {
            this.queue.push({
                run: async () => {
                    try {
                        resolve(await task());
                    } catch (err) {
                        reject(err);
                    }
                },
                cancel: () => reject(new TaskCancelledError())
            });
            this.idleWorkers.shift()?.();
        });
    }

    /**
     * Stops accepting tasks and resolves once the queue is drained (or
     * cancelled) and every worker has exited. Detaches from the signal, which
     * may outlive the pool.
     */
    async close(): Promise<void> {
        this.closed = true;
        this.signal?.removeEventListener('abort', this.onAbort);
        this.wakeAll();
        await Promise.all(this.workers);
    }

    private async work(): Promise<void> {
        for (;;) {
            const job = await this.next();
            if (!job) return;
            await job.run();
        }
    }

    private async next(): Promise<Job | undefined> {
        for (;;) {
            if (this.signal?.aborted) {
                this.cancelQueued();
                return undefined;
            }
            const job = this.queue.shift();
            if (job) return job;
            if (this.closed) return undefined;
            await new Promise<void>(resolve => this.idleWorkers.push(resolve));
        }
    }

    private cancelQueued(): void {
        for (const job of this.queue.splice(0)) {
            job.cancel();
        }
    }

    private wakeAll(): void {
        for (const wake of this.idleWorkers.splice(0)) {
            wake();
        }
    }
}
