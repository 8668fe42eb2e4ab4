import { RingQueue } from '../ring-queue';
import { QueueAllocationError, QueueConfigError } from '../errors';
import { silentLogger } from '../logger';
import { LoggerAdapter } from '../types';

const createMockLogger = (debugEnabled = true): jest.Mocked<LoggerAdapter> => ({
  isDebugEnabled: jest.fn().mockReturnValue(debugEnabled),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  fatal: jest.fn()
});

describe('RingQueue', () => {
  let queue: RingQueue<number>;

  beforeEach(() => {
    queue = new RingQueue<number>({ capacity: 6, logger: silentLogger });
  });

  describe('construction', () => {
    test('should start empty', () => {
      expect(queue.isEmpty()).toBe(true);
      expect(queue.isFull()).toBe(false);
      expect(queue.size()).toBe(0);
      expect(queue.capacity).toBe(6);
      expect(queue.getFullOverwrite()).toBe(false);
      expect(queue.getState()).toBe('EMPTY');
    });

    test('should accept a bare capacity', () => {
      const small = new RingQueue<string>(2);
      expect(small.capacity).toBe(2);
      expect(small.name).toBe('ring-queue');
    });

    test('should reject a zero capacity', () => {
      expect(() => new RingQueue<number>({ capacity: 0, logger: silentLogger }))
        .toThrow(QueueConfigError);
    });

    test('should reject a fractional capacity', () => {
      expect(() => new RingQueue<number>({ capacity: 2.5, logger: silentLogger }))
        .toThrow('capacity must be a positive integer, got 2.5');
    });

    test('should report allocation failure as an error', () => {
      let caught: unknown;
      try {
        new RingQueue<number>({ capacity: 2 ** 32, logger: silentLogger });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(QueueAllocationError);
      expect(caught).toMatchObject({ code: 'ALLOCATION_FAILED', cause: expect.any(RangeError) });
    });
  });

  describe('reject on full (default)', () => {
    test('should keep the first items and refuse the rest', () => {
      const results: boolean[] = [];
      for (let i = 0; i <= 8; i++) {
        results.push(queue.push(i));
      }

      expect(results).toEqual([true, true, true, true, true, true, false, false, false]);

      const drained: number[] = [];
      let value = queue.pop();
      while (value !== undefined) {
        drained.push(value);
        value = queue.pop();
      }

      expect(drained).toEqual([0, 1, 2, 3, 4, 5]);
      expect(queue.isEmpty()).toBe(true);
      expect(queue.pop()).toBeUndefined();
    });

    test('should not mutate the queue on a rejected push', () => {
      for (let i = 0; i < 6; i++) {
        queue.push(i);
      }

      expect(queue.push(99)).toBe(false);
      expect(queue.size()).toBe(6);
      expect(queue.peek()).toBe(0);
      expect(queue.toArray()).toEqual([0, 1, 2, 3, 4, 5]);
    });
  });

  describe('overwrite on full', () => {
    test('should keep the newest items', () => {
      queue.setFullOverwrite(true);

      const results: boolean[] = [];
      for (let i = 0; i <= 8; i++) {
        results.push(queue.push(i));
      }

      expect(results.every(Boolean)).toBe(true);
      expect(queue.drain()).toEqual([3, 4, 5, 6, 7, 8]);
      expect(queue.isEmpty()).toBe(true);
    });

    test('should drop exactly the oldest item for capacity + 1 pushes', () => {
      const letters = new RingQueue<string>({ capacity: 3, overwriteOnFull: true, logger: silentLogger });
      ['a', 'b', 'c', 'd'].forEach(letter => letters.push(letter));

      expect(letters.isFull()).toBe(true);
      expect(letters.drain()).toEqual(['b', 'c', 'd']);
    });

    test('should take effect only after being enabled', () => {
      for (let i = 0; i < 6; i++) {
        queue.push(i);
      }
      expect(queue.push(6)).toBe(false);

      queue.setFullOverwrite(true);
      expect(queue.push(7)).toBe(true);

      queue.setFullOverwrite(false);
      expect(queue.push(8)).toBe(false);

      expect(queue.toArray()).toEqual([1, 2, 3, 4, 5, 7]);
    });
  });

  describe('pop and peek', () => {
    test('should round-trip a pushed item', () => {
      queue.push(42);
      expect(queue.pop()).toBe(42);
      expect(queue.isEmpty()).toBe(true);
    });

    test('should return the same value from repeated peeks', () => {
      queue.push(7);
      queue.push(8);

      expect(queue.peek()).toBe(7);
      expect(queue.peek()).toBe(7);
      expect(queue.size()).toBe(2);
    });

    test('should return undefined from an empty queue', () => {
      expect(queue.peek()).toBeUndefined();
      expect(queue.pop()).toBeUndefined();
      expect(queue.size()).toBe(0);
    });

    // The last round overflows by one, so 33 is refused
    test('should keep FIFO order across wrap-around', () => {
      const popped: Array<number | undefined> = [];
      for (let round = 0; round < 4; round++) {
        for (let i = 0; i < 4; i++) {
          queue.push(round * 10 + i);
        }
        for (let i = 0; i < 3; i++) {
          popped.push(queue.pop());
        }
      }

      expect(popped).toEqual([0, 1, 2, 3, 10, 11, 12, 13, 20, 21, 22, 23]);
      expect(queue.toArray()).toEqual([30, 31, 32]);
    });
  });

  describe('state', () => {
    test('should report empty and full exclusively', () => {
      expect([queue.isEmpty(), queue.isFull()]).toEqual([true, false]);

      queue.push(1);
      expect([queue.isEmpty(), queue.isFull()]).toEqual([false, false]);
      expect(queue.getState()).toBe('PARTIAL');

      for (let i = 2; i <= 6; i++) {
        queue.push(i);
      }
      expect([queue.isEmpty(), queue.isFull()]).toEqual([false, true]);
      expect(queue.getState()).toBe('FULL');
    });

    test('should track count as pushes minus pops', () => {
      let expected = 0;
      const operations = [1, 1, 1, 0, 1, 1, 1, 1, 1, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 1];

      operations.forEach((op, i) => {
        if (op === 1) {
          if (queue.push(i)) {
            expected++;
          }
        } else if (queue.pop() !== undefined) {
          expected--;
        }
        expect(queue.size()).toBe(expected);
        expect(queue.size()).toBeGreaterThanOrEqual(0);
        expect(queue.size()).toBeLessThanOrEqual(6);
      });
    });
  });

  describe('clear', () => {
    test('should empty a full queue', () => {
      for (let i = 0; i < 6; i++) {
        queue.push(i);
      }

      queue.clear();

      expect(queue.isEmpty()).toBe(true);
      expect(queue.pop()).toBeUndefined();
      expect(queue.toArray()).toEqual([]);
    });

    test('should be idempotent', () => {
      queue.push(1);
      queue.clear();
      queue.clear();

      expect(queue.isEmpty()).toBe(true);
      queue.push(2);
      expect(queue.drain()).toEqual([2]);
    });
  });

  describe('stats', () => {
    test('should count pushes, pops, rejections and overwrites', () => {
      for (let i = 0; i < 8; i++) {
        queue.push(i);
      }
      queue.setFullOverwrite(true);
      queue.push(8);
      queue.pop();
      queue.clear();

      const stats = queue.getStats();
      expect(stats).toMatchObject({
        capacity: 6,
        itemSize: null,
        count: 0,
        state: 'EMPTY',
        pushCount: 7,
        popCount: 1,
        rejectedCount: 2,
        overwrittenCount: 1,
        clearCount: 1
      });
      expect(stats.lastClearTime).toBeInstanceOf(Date);
    });

    test('should reset counters', () => {
      queue.push(1);
      queue.resetStats();

      expect(queue.getStats()).toMatchObject({ count: 1, pushCount: 0, lastClearTime: null });
    });
  });

  describe('logging', () => {
    test('should log overwrites and rejections at debug', () => {
      const logger = createMockLogger();
      const logged = new RingQueue<number>({ capacity: 1, name: 'samples', logger });

      logged.push(1);
      logged.push(2);
      logged.setFullOverwrite(true);
      logged.push(3);

      expect(logger.debug).toHaveBeenCalledWith('Allocating queue storage', { queue: 'samples', storage: '1 slots' });
      expect(logger.debug).toHaveBeenCalledWith('Push rejected, queue full', { queue: 'samples', count: 1 });
      expect(logger.debug).toHaveBeenCalledWith('Overwriting oldest item', { queue: 'samples', slot: 0 });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('should log Pop for pops but not for overwrite evictions', () => {
      const logger = createMockLogger();
      const logged = new RingQueue<number>({ capacity: 1, overwriteOnFull: true, name: 'samples', logger });

      logged.push(1);
      logged.push(2);
      expect(logger.debug).not.toHaveBeenCalledWith('Pop', expect.anything());

      expect(logged.pop()).toBe(2);
      expect(logger.debug).toHaveBeenCalledWith('Pop', { queue: 'samples', slot: 0 });
      expect(logger.debug).toHaveBeenCalledTimes(5);
    });

    test('should skip debug calls when debug is disabled', () => {
      const logger = createMockLogger(false);
      const logged = new RingQueue<number>({ capacity: 2, overwriteOnFull: true, logger });

      for (let i = 0; i < 5; i++) {
        logged.push(i);
      }
      logged.pop();
      logged.drain();
      logged.clear();

      expect(logger.isDebugEnabled).toHaveBeenCalled();
      expect(logger.debug).not.toHaveBeenCalled();
    });
  });
});
