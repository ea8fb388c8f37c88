import { pino, type DestinationStream, type Logger, type LevelWithSilent } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  name: string;
  level?: LevelWithSilent;
}

/**
 * Builds a structured logger. Every record carries an ISO timestamp, the
 * emitting component and the redaction rules; tests pass their own destination.
 */
export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  const config = {
    name: options.name,
    level: options.level ?? "info",
    base: {
      service: "observability-demo"
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACT_KEYS,
      censor: REDACT_CENSOR
    }
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Process logger for bootstrap code. Components take a logger by injection.
 */
export const logger = createLogger({ name: "bootstrap" });
