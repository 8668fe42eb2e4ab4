export { RingQueue } from './ring-queue';
export { ByteRingQueue } from './byte-ring-queue';
export { QueueBase } from './queue-base';
export { QueueHealthChecker } from './health-check';
export type { HealthStatus, HealthState, QueueHealth, HealthCheckerOptions } from './health-check';
export { resolveQueueConfig, resolveByteQueueConfig, DEFAULT_QUEUE_NAME } from './config';
export type { ResolvedQueueConfig, ResolvedByteQueueConfig } from './config';
export { loadConfigFromEnv, isLogLevel } from './env';
export type { EnvQueueConfig } from './env';
export { createLogger, createDefaultLogger, getDefaultLogger, setDefaultLogger, silentLogger } from './logger';
export { WinstonQueueLogger, createWinstonAdapter } from './adapters/winston';
export { BunyanQueueLogger, createBunyanAdapter } from './adapters/bunyan';
export type { BunyanLike } from './adapters/bunyan';
export * from './errors';
export * from './types';

// Default export for convenience
import { RingQueue } from './ring-queue';
import { ByteRingQueue } from './byte-ring-queue';
import { QueueHealthChecker } from './health-check';

export default {
  RingQueue,
  ByteRingQueue,
  QueueHealthChecker
};
