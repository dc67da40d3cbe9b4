/**
 * Stable Engine - Runtime Configuration
 *
 * Reads ambient settings (logging, metrics) from environment variables with
 * sensible defaults. Protocol parameters live in calculator.ts and are fixed.
 */

import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EngineConfig {
  /** Environment: production | staging | development | test */
  environment: string;
  /** winston level */
  logLevel: LogLevel;
  /** Optional log file; console only when unset */
  logFile?: string;
  /** Prefix for every Prometheus metric name */
  metricsPrefix: string;
  /** Also collect Node.js runtime metrics into the engine registry */
  collectDefaultMetrics: boolean;
}

export const DEFAULT_CONFIG: EngineConfig = {
  environment: "development",
  logLevel: "info",
  metricsPrefix: "stable_engine_",
  collectDefaultMetrics: false,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Build the engine configuration from an environment map.
 * A local .env file is loaded first, except under test.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  if (env === process.env && process.env.NODE_ENV !== "test") {
    dotenv.config();
  }

  const logLevel = (env.LOG_LEVEL || DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}; got "${logLevel}"`);
  }

  const config: EngineConfig = {
    environment: env.NODE_ENV || DEFAULT_CONFIG.environment,
    logLevel,
    logFile: env.ENGINE_LOG_FILE || undefined,
    metricsPrefix: env.ENGINE_METRICS_PREFIX ?? DEFAULT_CONFIG.metricsPrefix,
    collectDefaultMetrics: env.ENGINE_COLLECT_DEFAULT_METRICS === "true",
  };
  validateEngineConfig(config);
  return config;
}

/**
 * Validate that the configuration is usable.
 * Throws ConfigurationError on the first problem found.
 */
export function validateEngineConfig(config: EngineConfig): void {
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Unknown log level "${config.logLevel}"`);
  }
  // Prometheus metric names: [a-zA-Z_:][a-zA-Z0-9_:]*
  if (config.metricsPrefix && !/^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(config.metricsPrefix)) {
    throw new ConfigurationError(`ENGINE_METRICS_PREFIX "${config.metricsPrefix}" is not a valid metric name prefix`);
  }
  if (config.environment === "production" && config.logLevel === "silly") {
    throw new ConfigurationError("LOG_LEVEL=silly is not allowed in production");
  }
}
