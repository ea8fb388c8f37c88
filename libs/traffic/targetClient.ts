/**
 * Outbound side of the traffic generator. `get` resolves with the HTTP status
 * of any response, 5xx included; it rejects only on transport failure
 * (connection refused, DNS, timeout).
 */
export interface TargetClient {
    get(endpoint: string): Promise<number>;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export class FetchTargetClient implements TargetClient {
    private readonly baseUrl: string;

    constructor(
        baseUrl: string,
        private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
        private readonly fetchImpl: typeof fetch = fetch
    ) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async get(endpoint: string): Promise<number> {
        const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
            method: 'GET',
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        // Drain the body so the connection is released.
        await response.arrayBuffer();
        return response.status;
    }
}
