import { loadConfig, TrafficConfigSchema } from '../../../libs/config/config.js';
import { createLogger, logger } from '../../../libs/logging/logger.js';
import { waitUntilReady, ReadinessAbortedError } from '../../../libs/traffic/readiness.js';
import { FetchTargetClient } from '../../../libs/traffic/targetClient.js';
import { TrafficScheduler } from '../../../libs/traffic/TrafficScheduler.js';

async function main() {
    const config = loadConfig(TrafficConfigSchema, process.env, 'TrafficGenerator:Config');
    const log = createLogger({ name: 'traffic-generator', level: config.LOG_LEVEL });

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
        if (controller.signal.aborted) return;
        log.info({ signal }, 'Interrupt received, draining in-flight requests');
        controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    log.info({ target: config.TARGET_URL }, 'Traffic generator starting');
    const client = new FetchTargetClient(config.TARGET_URL, config.REQUEST_TIMEOUT_MS);

    log.info('Waiting for service to be ready...');
    try {
        await waitUntilReady(() => client.get(config.READINESS_PATH), {
            pollIntervalMs: config.READINESS_POLL_MS,
            timeoutMs: config.READINESS_TIMEOUT_SECONDS === undefined ? undefined : config.READINESS_TIMEOUT_SECONDS * 1000,
            logger: log,
            signal: controller.signal
        });
    } catch (err) {
        if (err instanceof ReadinessAbortedError) {
            log.info('Stopping traffic generator...');
            return;
        }
        throw err;
    }

    const scheduler = new TrafficScheduler(client, {
        endpoints: config.ENDPOINTS,
        logger: log,
        steadyWorkers: config.STEADY_WORKERS,
        burstWorkers: config.BURST_WORKERS
    });

    await scheduler.runCycles({
        steady: { durationSeconds: config.STEADY_DURATION_SECONDS, rate: config.TARGET_RATE },
        burst: { concurrency: config.BURST_REQUESTS },
        restSeconds: config.REST_SECONDS
    }, controller.signal);
}

main().catch(err => {
    logger.fatal({ err }, 'Traffic generator failed');
    process.exit(1);
});
