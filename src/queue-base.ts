import { QueueAllocationError } from './errors';
import { LoggerAdapter, QueueState, QueueStats } from './types';

interface QueueCounters {
  pushCount: number;
  popCount: number;
  rejectedCount: number;
  overwrittenCount: number;
  clearCount: number;
  lastClearTime: Date | null;
}

const emptyCounters = (): QueueCounters => ({
  pushCount: 0,
  popCount: 0,
  rejectedCount: 0,
  overwrittenCount: 0,
  clearCount: 0,
  lastClearTime: null
});

export interface QueueBaseConfig {
  capacity: number;
  overwriteOnFull: boolean;
  name: string;
  logger: LoggerAdapter;
}

/**
 * Slot bookkeeping shared by the ring queues: indices, occupancy, the
 * full-buffer policy and counters. Subclasses own the storage and move
 * items in and out of the slot numbers handed to them.
 */
export abstract class QueueBase {
  readonly capacity: number;
  readonly name: string;

  protected logger: LoggerAdapter;
  private overwriteOnFull: boolean;
  private count = 0;
  private putIndex = 0;
  private takeIndex = 0;
  private counters: QueueCounters = emptyCounters();

  protected constructor(config: QueueBaseConfig) {
    this.capacity = config.capacity;
    this.name = config.name;
    this.logger = config.logger;
    this.overwriteOnFull = config.overwriteOnFull;
  }

  /** Discards the oldest item through the pop path to free its slot. */
  protected abstract evictOldest(): void;

  protected abstract getItemSize(): number | null;

  protected allocate<S>(description: string, allocator: () => S): S {
    try {
      const storage = allocator();
      if (this.logger.isDebugEnabled()) {
        this.logger.debug('Allocating queue storage', { queue: this.name, storage: description });
      }
      return storage;
    } catch (error) {
      if (error instanceof RangeError) {
        throw new QueueAllocationError(`Unable to allocate ${description} for queue "${this.name}"`, error);
      }
      throw error;
    }
  }

  /**
   * Claims the slot the next push writes to, or returns null when the queue
   * is full and overwriting is disabled.
   */
  protected reserveSlot(): number | null {
    if (this.isFull()) {
      if (!this.overwriteOnFull) {
        this.counters.rejectedCount++;
        if (this.logger.isDebugEnabled()) {
          this.logger.debug('Push rejected, queue full', { queue: this.name, count: this.count });
        }
        return null;
      }

      if (this.logger.isDebugEnabled()) {
        this.logger.debug('Overwriting oldest item', { queue: this.name, slot: this.takeIndex });
      }
      this.evictOldest();
      this.counters.overwrittenCount++;
    }

    const slot = this.putIndex;
    if (this.logger.isDebugEnabled()) {
      this.logger.debug('Push', { queue: this.name, slot });
    }
    this.putIndex = (this.putIndex + 1) % this.capacity;
    this.count++;
    this.counters.pushCount++;
    return slot;
  }

  /**
   * Frees the oldest slot and returns its number, or null when empty.
   * Shared by public pops and overwrite evictions; only the former go
   * through `recordPop`.
   */
  protected releaseSlot(): number | null {
    if (this.isEmpty()) {
      return null;
    }

    const slot = this.takeIndex;
    this.takeIndex = (this.takeIndex + 1) % this.capacity;
    this.count--;
    return slot;
  }

  protected oldestSlot(): number | null {
    return this.isEmpty() ? null : this.takeIndex;
  }

  protected recordPop(slot: number): void {
    this.counters.popCount++;
    if (this.logger.isDebugEnabled()) {
      this.logger.debug('Pop', { queue: this.name, slot });
    }
  }

  /** Live slot numbers, oldest first. */
  protected liveSlots(): number[] {
    const slots: number[] = [];
    for (let i = 0; i < this.count; i++) {
      slots.push((this.takeIndex + i) % this.capacity);
    }
    return slots;
  }

  /** Empties the queue without touching stored slots. */
  clear(): void {
    this.count = 0;
    this.putIndex = 0;
    this.takeIndex = 0;
    this.counters.clearCount++;
    this.counters.lastClearTime = new Date();
    if (this.logger.isDebugEnabled()) {
      this.logger.debug('Queue cleared', { queue: this.name });
    }
  }

  setFullOverwrite(enabled: boolean): void {
    this.overwriteOnFull = enabled;
  }

  getFullOverwrite(): boolean {
    return this.overwriteOnFull;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity && this.capacity !== 0;
  }

  size(): number {
    return this.count;
  }

  getState(): QueueState {
    if (this.isEmpty()) {
      return 'EMPTY';
    }
    return this.isFull() ? 'FULL' : 'PARTIAL';
  }

  getStats(): QueueStats {
    return {
      capacity: this.capacity,
      itemSize: this.getItemSize(),
      count: this.count,
      state: this.getState(),
      ...this.counters
    };
  }

  resetStats(): void {
    this.counters = emptyCounters();
  }
}
