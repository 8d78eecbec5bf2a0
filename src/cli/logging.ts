import { appendFileSync } from 'node:fs';
import log from 'loglevel';
import { CHECKER_LOGGER } from './const.js';
import type { CheckerConfig } from './config.js';

export const checkerLogger = log.getLogger(CHECKER_LOGGER);

export function formatLogLine(level: log.LogLevelNames, message: unknown[], now: Date = new Date()): string {
  return `${now.toISOString()} - ${level.toUpperCase()} - ${message.map(String).join(' ')}\n`;
}

/** Redirects every enabled method of `logger` to `file`, one line per call. */
export function attachFileSink(logger: log.Logger, file: string): void {
  logger.methodFactory = (methodName) => (...message: unknown[]) => {
    appendFileSync(file, formatLogLine(methodName, message));
  };
  // loglevel only rebuilds its methods when the level is set
  logger.setLevel(logger.getLevel());
}

export function configureLogging(config: CheckerConfig): void {
  log.setLevel('info');
  checkerLogger.setLevel(config.verbose || config.logFile ? 'info' : 'warn');
  if (config.logFile) attachFileSink(checkerLogger, config.logFile);
}
