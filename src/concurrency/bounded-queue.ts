/**
 * Bounded FIFO with drop-oldest backpressure.
 * Circular buffer, O(1) enqueue/dequeue regardless of queue state.
 */

export interface BoundedQueueOptions<T> {
  /** Queue name used in drop logs and metrics. */
  name: string;
  capacity: number;
  /** Called with the evicted item and the running drop count. */
  onDrop?: (dropped: T, totalDropped: number) => void;
}

export class BoundedQueue<T> {
  readonly name: string;
  private buffer: (T | undefined)[];
  private head = 0; // oldest element
  private tail = 0; // next write position
  private count = 0;
  private droppedTotal = 0;
  private readonly capacity: number;
  private readonly onDrop?: (dropped: T, totalDropped: number) => void;

  constructor(opts: BoundedQueueOptions<T>) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new RangeError(`BoundedQueue "${opts.name}" capacity must be a positive integer`);
    }
    this.name = opts.name;
    this.capacity = opts.capacity;
    this.onDrop = opts.onDrop;
    this.buffer = new Array<T | undefined>(opts.capacity).fill(undefined);
  }

  /** Enqueue an item. Returns true when the oldest item was dropped to make room. */
  enqueue(item: T): boolean {
    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.buffer[this.head];
      this.buffer[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      this.droppedTotal++;
    }
    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    if (evicted !== undefined) {
      this.onDrop?.(evicted, this.droppedTotal);
      return true;
    }
    return false;
  }

  /** Oldest item, or undefined when empty. */
  dequeue(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** Remove up to `max` items in FIFO order. */
  drain(max: number = this.capacity): T[] {
    const out: T[] = [];
    while (out.length < max) {
      const item = this.dequeue();
      if (item === undefined) break;
      out.push(item);
    }
    return out;
  }

  /** Items dropped by backpressure since construction. */
  get dropped(): number {
    return this.droppedTotal;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
