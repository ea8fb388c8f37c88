/**
 * Request metrics: a counter keyed by (method, endpoint, status) and a
 * latency histogram in seconds. Serializes to Prometheus text exposition (v0.0.4).
 *
 * Node runs each increment/observe to completion on one thread, so every
 * update is atomic with respect to concurrent requests.
 */

/** Prometheus client default buckets, in seconds. */
export const DEFAULT_LATENCY_BUCKETS: readonly number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/**
 * Decides the endpoint label recorded for a path. Unbounded label cardinality
 * is an operational risk; a policy can collapse paths onto templates.
 */
export interface LabelPolicy {
    endpointLabel(path: string): string;
}

export const passthroughLabelPolicy: LabelPolicy = {
    endpointLabel: path => path
};

export interface CounterSample {
    readonly method: string;
    readonly path: string;
    readonly status: number;
    readonly value: number;
}

export interface HistogramSnapshot {
    readonly buckets: ReadonlyArray<{ readonly le: number; readonly count: number }>;
    readonly count: number;
    readonly sum: number;
}

export interface MetricsSnapshot {
    readonly counters: readonly CounterSample[];
    readonly histogram: HistogramSnapshot;
}

export interface MetricsRegistryOptions {
    buckets?: readonly number[];
    labelPolicy?: LabelPolicy;
}

export class MetricsRegistry {
    private readonly counters = new Map<string, { method: string; path: string; status: number; value: number }>();
    private readonly bucketBounds: readonly number[];
    private readonly bucketCounts: number[];
    private observationCount = 0;
    private observationSum = 0;
    private readonly labelPolicy: LabelPolicy;

    constructor(options: MetricsRegistryOptions = {}) {
        this.bucketBounds = [...(options.buckets ?? DEFAULT_LATENCY_BUCKETS)].sort((a, b) => a - b);
        this.bucketCounts = this.bucketBounds.map(() => 0);
        this.labelPolicy = options.labelPolicy ?? passthroughLabelPolicy;
    }

    increment(method: string, path: string, status: number): void {
        const endpoint = this.labelPolicy.endpointLabel(path);
        const key = `${method}\u0000${endpoint}\u0000${status}`;
        const entry = this.counters.get(key);
        if (entry) {
            entry.value += 1;
        } else {
            this.counters.set(key, { method, path: endpoint, status, value: 1 });
        }
    }

    observeLatency(seconds: number): void {
        this.observationCount += 1;
        this.observationSum += seconds;
        this.bucketBounds.forEach((bound, i) => {
            if (seconds <= bound) {
                this.bucketCounts[i] = (this.bucketCounts[i] ?? 0) + 1;
            }
        });
    }

    /**
     * Detached copy of the current values; later updates do not affect it.
     */
    snapshot(): MetricsSnapshot {
        return {
            counters: [...this.counters.values()].map(c => ({ ...c })),
            histogram: {
                buckets: this.bucketBounds.map((le, i) => ({ le, count: this.bucketCounts[i] ?? 0 })),
                count: this.observationCount,
                sum: this.observationSum
            }
        };
    }

    totalRequests(): number {
        let total = 0;
        for (const entry of this.counters.values()) total += entry.value;
        return total;
    }

    serialize(): string {
        const lines: string[] = [
            '# HELP http_requests_total Total HTTP requests',
            '# TYPE http_requests_total counter'
        ];
        for (const c of this.counters.values()) {
            lines.push(
                `http_requests_total{method="${escapeLabel(c.method)}",endpoint="${escapeLabel(c.path)}",status="${c.status}"} ${c.value}`
            );
        }

        lines.push('# HELP http_request_duration_seconds HTTP request latency');
        lines.push('# TYPE http_request_duration_seconds histogram');
        this.bucketBounds.forEach((le, i) => {
            lines.push(`http_request_duration_seconds_bucket{le="${le}"} ${this.bucketCounts[i] ?? 0}`);
        });
        lines.push(`http_request_duration_seconds_bucket{le="+Inf"} ${this.observationCount}`);
        lines.push(`http_request_duration_seconds_sum ${this.observationSum}`);
        lines.push(`http_request_duration_seconds_count ${this.observationCount}`);

        return `${lines.join('\n')}\n`;
    }
}

const escapeLabel = (value: string): string =>
    value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';
