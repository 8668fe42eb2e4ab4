import { assertPositiveInteger } from './env';
import { getDefaultLogger } from './logger';
import { ByteRingQueueOptions, RingQueueOptions } from './types';

export const DEFAULT_QUEUE_NAME = 'ring-queue';

export type ResolvedQueueConfig = Required<RingQueueOptions>;

export type ResolvedByteQueueConfig = Required<ByteRingQueueOptions>;

export function resolveQueueConfig(options: RingQueueOptions): ResolvedQueueConfig {
  assertPositiveInteger('capacity', options.capacity);

  return {
    capacity: options.capacity,
    overwriteOnFull: options.overwriteOnFull ?? false,
    name: options.name ?? DEFAULT_QUEUE_NAME,
    logger: options.logger ?? getDefaultLogger()
  };
}

export function resolveByteQueueConfig(options: ByteRingQueueOptions): ResolvedByteQueueConfig {
  const base = resolveQueueConfig(options);
  assertPositiveInteger('itemSize', options.itemSize);
  return { ...base, itemSize: options.itemSize };
}
