import { LogLevel } from '@nestjs/common';
import { LogLevelName } from './environment';

const SEVERITY: readonly LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const THRESHOLD: Record<LogLevelName, LogLevel> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  verbose: 'verbose',
};

/**
 * Translate LOG_LEVEL into the Nest logger levels to enable: the named level
 * and everything more severe.
 *
 * @example
 * resolveLogLevels('warn') // ['fatal', 'error', 'warn']
 */
export function resolveLogLevels(level: LogLevelName): LogLevel[] {
  return SEVERITY.slice(0, SEVERITY.indexOf(THRESHOLD[level]) + 1);
}
