/** Array-backed queue with amortised O(1) shift; used for waiter and backlog lists. */
export class FifoQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head] as T;
    this.head += 1;
    this.compact();

    return item;
  }

  /** Removes the first occurrence of `item`; returns whether it was queued. */
  remove(item: T): boolean {
    const index = this.items.indexOf(item, this.head);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  /** Empties the queue, returning what was pending in order. */
  drain(): T[] {
    const pending = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return pending;
  }

  private compact(): void {
    if (this.head > 64 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
