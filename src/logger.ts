/**
 * Stable Engine - Logger
 *
 * One winston logger per component, tagged the way the keeper services tag
 * their output: `<timestamp> [LEVEL] [COMPONENT] message`.
 */

import { createLogger, format, transports, Logger } from "winston";
import { DEFAULT_CONFIG, EngineConfig } from "./config";

export type { Logger } from "winston";

export function createEngineLogger(
  component: string,
  config: Pick<EngineConfig, "logLevel" | "logFile" | "environment"> = DEFAULT_CONFIG,
): Logger {
  const tag = component.toUpperCase();
  const logTransports: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
    new transports.Console(),
  ];
  if (config.logFile) {
    logTransports.push(new transports.File({ filename: config.logFile }));
  }

  return createLogger({
    level: config.logLevel,
    silent: config.environment === "test" || process.env.NODE_ENV === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) => `${timestamp} [${level.toUpperCase()}] [${tag}] ${message}`,
      ),
    ),
    transports: logTransports,
  });
}
