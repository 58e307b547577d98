import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, LoggerOptions } from 'pino';

export type { Logger, Level } from 'pino';

export type LogLevel = LevelWithSilent;

export type Environment = 'development' | 'production' | 'test';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export const DEFAULT_LOG_LEVELS: Record<Environment, LogLevel> = {
  development: 'debug',
  production: 'info',
  test: 'silent',
};

export interface LoggerConfig {
  /** Service name, bound to every line and used for LOG_LEVEL_<SERVICE> lookup */
  service: string;
  level?: LogLevel;
  /** File path or stream; stdout when omitted */
  destination?: string | DestinationStream;
}

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((candidate) => candidate === level);
}

function toEnvironment(value: string | undefined): Environment {
  return value === 'production' || value === 'test' ? value : 'development';
}

/**
 * Resolve the log level for a service.
 * Order: LOG_LEVEL_<SERVICE>, then LOG_LEVEL, then the NODE_ENV default.
 */
export function getLogLevel(service: string, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const serviceLevel = env[`LOG_LEVEL_${service.toUpperCase()}`];
  if (serviceLevel !== undefined && isValidLogLevel(serviceLevel)) {
    return serviceLevel;
  }

  const globalLevel = env.LOG_LEVEL;
  if (globalLevel !== undefined && isValidLogLevel(globalLevel)) {
    return globalLevel;
  }

  return DEFAULT_LOG_LEVELS[toEnvironment(env.NODE_ENV)];
}

/**
 * Create a service logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'api' });
 * logger.info({ port }, 'API server running');
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level ?? getLogLevel(config.service),
    base: { service: config.service, pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination === undefined) {
    return pino(options);
  }

  const stream =
    typeof config.destination === 'string'
      ? pino.destination({ dest: config.destination, mkdir: true, sync: false })
      : config.destination;

  return pino(options, stream);
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
