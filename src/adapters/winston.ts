import type { Logger } from 'winston';
import { LoggerAdapter } from '../types';

export class WinstonQueueLogger implements LoggerAdapter {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  isDebugEnabled(): boolean {
    return this.logger.isLevelEnabled('debug');
  }

  // Formats run before level filtering in winston, so filter here first
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (!this.isDebugEnabled()) {
      return;
    }
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.logger.error(message, metadata);
  }

  // winston's npm levels stop at "error"
  fatal(message: string, metadata?: Record<string, unknown>): void {
    this.logger.error(message, { ...metadata, fatal: true });
  }
}

// Helper function to wrap an existing winston logger
export function createWinstonAdapter(logger: Logger) {
  return new WinstonQueueLogger(logger);
}
