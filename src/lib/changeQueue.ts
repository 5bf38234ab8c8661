export type ChangeEvent = { path: string; at: number };

/**
 * Bounded FIFO between watcher callbacks and the cooperative loops. When full
 * the oldest event is dropped; the consumer only needs to know *that*
 * something changed, not every path.
 */
export class ChangeQueue<T extends { at: number } = ChangeEvent> {
  private items: T[] = [];
  private droppedCount = 0;
  private lastAt: number | undefined;

  constructor(private readonly capacity = 256) {
    if (capacity < 1) throw new RangeError('ChangeQueue capacity must be at least 1');
  }

  push(item: T) {
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    this.items.push(item);
    this.lastAt = item.at;
  }

  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** True once events are waiting and none arrived for `quietMs`. */
  isSettled(nowMs: number, quietMs: number): boolean {
    return this.items.length > 0 && this.lastAt !== undefined && nowMs - this.lastAt >= quietMs;
  }

  /** Events dropped since the previous call. */
  takeDropped(): number {
    const n = this.droppedCount;
    this.droppedCount = 0;
    return n;
  }
}
