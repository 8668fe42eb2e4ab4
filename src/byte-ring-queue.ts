import { resolveByteQueueConfig } from './config';
import { ItemSizeError } from './errors';
import { QueueBase } from './queue-base';
import { ByteRingQueueOptions } from './types';

/**
 * FIFO queue of fixed-size binary records held in a single `Uint8Array`
 * of `capacity * itemSize` bytes. Items are copied in on `push` and copied
 * out on `pop`/`peek`; the backing storage is never exposed.
 *
 * Not synchronized. Callers sharing an instance between a producer and a
 * consumer running concurrently must provide their own mutual exclusion.
 */
export class ByteRingQueue extends QueueBase {
  readonly itemSize: number;
  private readonly storage: Uint8Array;

  constructor(capacity: number, itemSize: number);
  constructor(options: ByteRingQueueOptions);
  constructor(capacityOrOptions: number | ByteRingQueueOptions, itemSize?: number) {
    const options = typeof capacityOrOptions === 'number'
      ? { capacity: capacityOrOptions, itemSize: itemSize ?? Number.NaN }
      : capacityOrOptions;
    const config = resolveByteQueueConfig(options);
    super(config);

    this.itemSize = config.itemSize;
    const bytes = config.capacity * config.itemSize;
    this.storage = this.allocate(`${bytes} bytes`, () => new Uint8Array(bytes));
  }

  protected getItemSize(): number | null {
    return this.itemSize;
  }

  // The evicted item is popped into the very slot the next push overwrites.
  protected evictOldest(): void {
    const slot = this.oldestSlot();
    if (slot !== null) {
      this.popInto(this.slotView(slot));
    }
  }

  private slotView(slot: number): Uint8Array {
    const offset = slot * this.itemSize;
    return this.storage.subarray(offset, offset + this.itemSize);
  }

  private assertTarget(out: Uint8Array): void {
    if (out.length < this.itemSize) {
      throw new ItemSizeError(this.itemSize, out.length);
    }
  }

  private popInto(target: Uint8Array): number | null {
    const slot = this.releaseSlot();
    if (slot !== null) {
      target.set(this.slotView(slot));
    }
    return slot;
  }

  /**
   * Copies `item` (exactly `itemSize` bytes) to the back of the queue.
   *
   * @returns false when the queue is full and overwrite-on-full is off
   * @throws ItemSizeError when `item` has the wrong length
   */
  push(item: Uint8Array): boolean {
    if (item.length !== this.itemSize) {
      throw new ItemSizeError(this.itemSize, item.length);
    }

    const slot = this.reserveSlot();
    if (slot === null) {
      return false;
    }
    this.storage.set(item, slot * this.itemSize);
    return true;
  }

  /**
   * Removes the oldest item, copying it into `out` (or a new array).
   * Returns the filled array, or null when the queue is empty.
   */
  pop(out?: Uint8Array): Uint8Array | null {
    const target = out ?? new Uint8Array(this.itemSize);
    this.assertTarget(target);

    const slot = this.popInto(target);
    if (slot === null) {
      return null;
    }
    this.recordPop(slot);
    return target;
  }

  /** Like `pop`, without removing the item. */
  peek(out?: Uint8Array): Uint8Array | null {
    const target = out ?? new Uint8Array(this.itemSize);
    this.assertTarget(target);

    const slot = this.oldestSlot();
    if (slot === null) {
      return null;
    }
    target.set(this.slotView(slot));
    return target;
  }

  drain(): Uint8Array[] {
    const items: Uint8Array[] = [];
    for (let item = this.pop(); item !== null; item = this.pop()) {
      items.push(item);
    }
    return items;
  }

  toArray(): Uint8Array[] {
    return this.liveSlots().map(slot => this.slotView(slot).slice());
  }
}
