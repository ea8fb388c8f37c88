import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { loadConfig, ServiceConfigSchema } from '../../../libs/config/config.js';
import { createLogger, logger } from '../../../libs/logging/logger.js';
import { MetricsRegistry } from '../../../libs/observability/metrics.js';
import { createTracing } from '../../../libs/observability/tracing.js';
import { createApp } from '../../../libs/pipeline/expressApp.js';
import { RequestPipeline } from '../../../libs/pipeline/RequestPipeline.js';
import { createDemoRoutes } from './handlers.js';

async function main() {
    const config = loadConfig(ServiceConfigSchema, process.env, 'DemoApi:Config');
    const log = createLogger({ name: config.SERVICE_NAME, level: config.LOG_LEVEL });

    const tracing = createTracing({
        serviceName: config.SERVICE_NAME,
        logger: log.child({ component: 'tracing' }),
        exporter: config.TRACING_ENABLED ? new OTLPTraceExporter({ url: config.OTLP_TRACES_URL }) : undefined
    });
    const metrics = new MetricsRegistry();

    const pipeline = new RequestPipeline({
        spans: tracing.spans,
        metrics,
        logger: log.child({ component: 'pipeline' })
    });

    const routes = createDemoRoutes({
        spans: tracing.spans,
        logger: log.child({ component: 'handlers' }),
        slowDelaySeconds: { min: config.SLOW_MIN_SECONDS, max: config.SLOW_MAX_SECONDS }
    });

    const app = createApp({ pipeline, routes, metrics });

    log.info({ host: config.HOST, port: config.PORT }, 'Starting demo service');
    const server = app.listen(config.PORT, config.HOST, () => {
        log.info({ host: config.HOST, port: config.PORT }, 'Demo service listening');
    });

    let stopping = false;
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        log.info({ signal }, 'Shutting down demo service');
        server.close(err => {
            if (err) {
                log.error({ err }, 'Server close failed');
            }
            void tracing.shutdown().then(() => {
                log.info('Demo service stopped');
                process.exit(err ? 1 : 0);
            });
        });
    };

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
}

main().catch(err => {
    logger.fatal({ err }, 'Demo service failed to start');
    process.exit(1);
});
