import log from 'loglevel';

export type LogLevelMethodNames = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<LogLevelMethodNames, (...msg: unknown[]) => void>;

export const LOGGER_NAME = 'scpi-link';

/**
 * Logger used by a link: `logger` when one is injected, otherwise the shared
 * `scpi-link` loglevel logger.
 *
 * `level` only applies to the shared logger and changes it for every link
 * in the process that writes to it. It is ignored when `logger` is given.
 */
export default function createLogger({
  logger,
  level,
}: {
  logger?: Logger;
  level?: log.LogLevelDesc;
} = {}): Logger {
  if (logger !== undefined) return logger;

  const loglevelLogger = log.getLogger(LOGGER_NAME);
  if (level !== undefined) {
    loglevelLogger.setLevel(level);
  }
  return loglevelLogger;
}
