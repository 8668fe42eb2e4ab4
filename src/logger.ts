import winston from 'winston';
import { WinstonQueueLogger } from './adapters/winston';
import { loadConfigFromEnv } from './env';
import { LoggerAdapter, LogLevel } from './types';

export { isLogLevel } from './env';

export interface CreateLoggerOptions {
  level?: LogLevel;
  service?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): LoggerAdapter {
  const { level = 'warn', service = 'slot-ring-queue' } = options;

  const logger = winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    defaultMeta: { service },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports: [new winston.transports.Console()]
  });

  return new WinstonQueueLogger(logger);
}

const noop = (): void => {};

export const silentLogger: LoggerAdapter = {
  isDebugEnabled: () => false,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop
};

let defaultLogger: LoggerAdapter | undefined;

/**
 * Builds a logger at the level named by RING_QUEUE_LOG_LEVEL, "warn" when
 * unset. An unknown level throws QueueConfigError, as `loadConfigFromEnv` does.
 */
export function createDefaultLogger(env: NodeJS.ProcessEnv = process.env): LoggerAdapter {
  const { logLevel = 'warn' } = loadConfigFromEnv(env);
  return createLogger({ level: logLevel });
}

/** Shared logger used by queues constructed without one. */
export function getDefaultLogger(): LoggerAdapter {
  if (!defaultLogger) {
    defaultLogger = createDefaultLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: LoggerAdapter): void {
  defaultLogger = logger;
}
