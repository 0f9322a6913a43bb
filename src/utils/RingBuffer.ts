/**
 * Fixed-capacity buffer that overwrites its oldest entry once full.
 */
export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private readonly size: number;
  private head: number = 0;
  private tail: number = 0;
  private count: number = 0;

  constructor(size: number) {
    if (size <= 0) {
      throw new RangeError('RingBuffer size must be positive');
    }
    this.size = size;
    this.buffer = new Array<T | undefined>(size);
  }

  push(item: T): void {
    if (this.count === this.size) {
      this.head = (this.head + 1) % this.size;
    } else {
      this.count++;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.size;
  }

  /** Oldest entry satisfying the predicate, scanning from the oldest. */
  findOldest(predicate: (item: T) => boolean): T | null {
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.size];
      if (item !== undefined && predicate(item)) return item;
    }
    return null;
  }
}
