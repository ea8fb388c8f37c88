import { ExportResultCode, type ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { ErrorCategory } from '../errors/sanitizer.js';
import type { Logger } from '../logging/logger.js';

/**
 * Telemetry boundary around the trace sink. Failed or throwing exports are
 * logged and the batch is dropped; nothing propagates to the request path.
 */
const category: ErrorCategory = 'TELEMETRY';

export class GuardedSpanExporter implements SpanExporter {
    constructor(
        private readonly inner: SpanExporter,
        private readonly logger: Logger
    ) { }

    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        try {
            this.inner.export(spans, result => {
                if (result.code !== ExportResultCode.SUCCESS) {
                    this.logger.warn({ category, dropped: spans.length, err: result.error }, 'Span export failed, batch dropped');
                }
                resultCallback(result);
            });
        } catch (err) {
            this.logger.warn({ category, dropped: spans.length, err }, 'Span export failed, batch dropped');
            resultCallback({
                code: ExportResultCode.FAILED,
                error: err instanceof Error ? err : new Error(String(err))
            });
        }
    }

    async shutdown(): Promise<void> {
        try {
            await this.inner.shutdown();
        } catch (err) {
            this.logger.warn({ category, err }, 'Span exporter shutdown failed');
        }
    }

    async forceFlush(): Promise<void> {
        try {
            await this.inner.forceFlush?.();
        } catch (err) {
            this.logger.warn({ category, err }, 'Span exporter flush failed');
        }
    }
}
