export type RingQueueErrorCode =
  | 'INVALID_CONFIG'
  | 'ALLOCATION_FAILED'
  | 'ITEM_SIZE_MISMATCH';

export class RingQueueError extends Error {
  readonly code: RingQueueErrorCode;

  constructor(code: RingQueueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RingQueueError';
    this.code = code;
  }
}

export class QueueConfigError extends RingQueueError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'QueueConfigError';
  }
}

/** Raised when the runtime refuses to allocate slot storage. */
export class QueueAllocationError extends RingQueueError {
  constructor(message: string, cause: unknown) {
    super('ALLOCATION_FAILED', message, { cause });
    this.name = 'QueueAllocationError';
  }
}

export class ItemSizeError extends RingQueueError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('ITEM_SIZE_MISMATCH', `Expected an item of ${expected} bytes, got ${actual}`);
    this.name = 'ItemSizeError';
    this.expected = expected;
    this.actual = actual;
  }
}
