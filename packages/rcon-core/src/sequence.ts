const INT32_MAX = 0x7fff_ffff;

/**
 * Per-connection request id allocator.
 *
 * Starts at 0, which belongs to the authentication exchange, so the first
 * id handed out is 1. After 2147483647 it wraps to 1, never to 0 or below.
 */
export class SequenceCounter {
  private current: number;

  constructor(start = 0) {
    if (!Number.isInteger(start) || start < 0 || start > INT32_MAX) {
      throw new RangeError(`sequence start must be in [0, ${INT32_MAX}], got: ${start}`);
    }
    this.current = start;
  }

  next(): number {
    this.current = this.current === INT32_MAX ? 1 : this.current + 1;
    return this.current;
  }

  /** The last id handed out (0 before the first command). */
  peek(): number {
    return this.current;
  }
}
