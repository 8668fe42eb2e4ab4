import { QueueConfigError } from './errors';
import { LogLevel } from './types';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface EnvQueueConfig {
  capacity?: number;
  itemSize?: number;
  overwriteOnFull?: boolean;
  logLevel?: LogLevel;
}

export function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new QueueConfigError(`${field} must be a positive integer, got ${value}`);
  }
}

function parseInteger(key: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new QueueConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  const value = Number(trimmed);
  assertPositiveInteger(key, value);
  return value;
}

function parseBoolean(key: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new QueueConfigError(`${key} must be a boolean, got "${raw}"`);
  }
}

/**
 * Reads queue settings from environment variables. Only variables that are
 * set (and non-empty) show up in the result.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = 'RING_QUEUE_'
): EnvQueueConfig {
  const config: EnvQueueConfig = {};
  const read = (name: string): [string, string] | undefined => {
    const key = `${prefix}${name}`;
    const raw = env[key];
    return raw === undefined || raw.trim() === '' ? undefined : [key, raw];
  };

  const capacity = read('CAPACITY');
  if (capacity) {
    config.capacity = parseInteger(...capacity);
  }

  const itemSize = read('ITEM_SIZE');
  if (itemSize) {
    config.itemSize = parseInteger(...itemSize);
  }

  const overwrite = read('OVERWRITE');
  if (overwrite) {
    config.overwriteOnFull = parseBoolean(...overwrite);
  }

  const logLevel = read('LOG_LEVEL');
  if (logLevel) {
    const [key, raw] = logLevel;
    const level = raw.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new QueueConfigError(`${key} must be one of debug, info, warn, error, silent, got "${raw}"`);
    }
    config.logLevel = level;
  }

  return config;
}
