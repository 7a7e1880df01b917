import { ILogConfig, ILogger, LogLevel, buildLeveledLogger } from "./shared/logger";

/**
 * Process-wide settings. Nothing here changes what is decoded, encoded or considered equal.
 */

let cleanDebug = true;

let logConfig: ILogConfig = { logger: console, level: LogLevel.warn };
let leveledLogger: ILogger = buildLeveledLogger(logConfig);

/**
 * Clean rendering (the default) prints decoded values; raw rendering prints
 * kind tags and container internals.
 */
export function setCleanDebug(enabled: boolean) {
  cleanDebug = enabled;
}

export function enableCleanDebug() {
  setCleanDebug(true);
}

export function disableCleanDebug() {
  setCleanDebug(false);
}

export function isCleanDebug() {
  return cleanDebug;
}

export function configureLogging(config: Partial<ILogConfig>) {
  logConfig = { ...logConfig, ...config };
  leveledLogger = buildLeveledLogger(logConfig);
}

export function getLogConfig(): ILogConfig {
  return logConfig;
}

export function getLogger(): ILogger {
  return leveledLogger;
}
