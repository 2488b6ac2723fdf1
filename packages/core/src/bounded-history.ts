/**
 * Fixed-capacity history, newest first.
 *
 * Pushing onto a full buffer evicts the oldest entry.
 */
export class BoundedHistory<T> {
  private readonly capacity: number;
  private buf: T[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  push(item: T): void {
    this.buf.unshift(item);
    if (this.buf.length > this.capacity) {
      this.buf = this.buf.slice(0, this.capacity);
    }
  }

  get size(): number {
    return this.buf.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  /**
   * Copy of the contents, newest first
   */
  toArray(): T[] {
    return [...this.buf];
  }

  clear(): void {
    this.buf = [];
  }
}
