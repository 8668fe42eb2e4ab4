export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerAdapter {
  /** Lets hot paths skip building debug metadata that would be discarded. */
  isDebugEnabled(): boolean;
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  fatal(message: string, metadata?: Record<string, unknown>): void;
}

export type QueueState = 'EMPTY' | 'PARTIAL' | 'FULL';

export interface RingQueueOptions {
  capacity: number;
  overwriteOnFull?: boolean;
  name?: string;
  logger?: LoggerAdapter;
}

export interface ByteRingQueueOptions extends RingQueueOptions {
  itemSize: number;
}

export interface QueueStats {
  capacity: number;
  /** Bytes per slot; null for queues of typed items. */
  itemSize: number | null;
  count: number;
  state: QueueState;
  pushCount: number;
  popCount: number;
  rejectedCount: number;
  overwrittenCount: number;
  clearCount: number;
  lastClearTime: Date | null;
}

export interface StatsSource {
  getStats(): QueueStats;
}
