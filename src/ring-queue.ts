import { resolveQueueConfig } from './config';
import { QueueBase } from './queue-base';
import { RingQueueOptions } from './types';

/**
 * Fixed-capacity FIFO queue of typed items stored in a circular array.
 *
 * Not synchronized: a producer and a consumer sharing one instance across
 * workers must coordinate access themselves.
 *
 * `pop` and `peek` return `undefined` when the queue is empty, so queues
 * that store `undefined` itself should check `isEmpty()` first.
 */
export class RingQueue<T> extends QueueBase {
  private readonly slots: T[];

  constructor(capacityOrOptions: number | RingQueueOptions) {
    const options = typeof capacityOrOptions === 'number'
      ? { capacity: capacityOrOptions }
      : capacityOrOptions;
    const config = resolveQueueConfig(options);
    super(config);

    this.slots = this.allocate(`${config.capacity} slots`, () => new Array<T>(config.capacity));
  }

  protected evictOldest(): void {
    const slot = this.releaseSlot();
    if (slot !== null) {
      delete this.slots[slot];
    }
  }

  protected getItemSize(): number | null {
    return null;
  }

  /**
   * Appends an item. When the queue is full the item is refused (returns
   * false) unless overwrite-on-full is enabled, in which case the oldest
   * item is dropped to make room.
   */
  push(item: T): boolean {
    const slot = this.reserveSlot();
    if (slot === null) {
      return false;
    }
    this.slots[slot] = item;
    return true;
  }

  pop(): T | undefined {
    const slot = this.releaseSlot();
    if (slot === null) {
      return undefined;
    }

    return this.take(slot);
  }

  // Drops the slot's reference so a popped item can be collected
  private take(slot: number): T {
    const item = this.slots[slot];
    delete this.slots[slot];
    this.recordPop(slot);
    return item;
  }

  peek(): T | undefined {
    const slot = this.oldestSlot();
    return slot === null ? undefined : this.slots[slot];
  }

  // Pops every item, oldest first
  drain(): T[] {
    const items: T[] = [];
    for (let slot = this.releaseSlot(); slot !== null; slot = this.releaseSlot()) {
      items.push(this.take(slot));
    }
    return items;
  }

  toArray(): T[] {
    return this.liveSlots().map(slot => this.slots[slot]);
  }
}
