import { LoggerAdapter } from '../types';

type BunyanLogFn = (fields: Record<string, unknown>, msg: string) => void;

// bunyan's numeric DEBUG level
const BUNYAN_DEBUG = 20;

/** The subset of a bunyan logger the adapter writes through. */
export interface BunyanLike {
  level(): number;
  debug: BunyanLogFn;
  info: BunyanLogFn;
  warn: BunyanLogFn;
  error: BunyanLogFn;
  fatal: BunyanLogFn;
}

export class BunyanQueueLogger implements LoggerAdapter {
  private logger: BunyanLike;

  constructor(logger: BunyanLike) {
    this.logger = logger;
  }

  isDebugEnabled(): boolean {
    return this.logger.level() <= BUNYAN_DEBUG;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(metadata ?? {}, message);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logger.info(metadata ?? {}, message);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(metadata ?? {}, message);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.logger.error(metadata ?? {}, message);
  }

  fatal(message: string, metadata?: Record<string, unknown>): void {
    this.logger.fatal(metadata ?? {}, message);
  }
}

// Helper function to wrap an existing bunyan logger
export function createBunyanAdapter(logger: BunyanLike) {
  return new BunyanQueueLogger(logger);
}
