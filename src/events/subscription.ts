import type { MonitorEvent } from '../schema/index.js';

// ── Subscription ─────────────────────────────────────────────
// A bounded per-observer queue. Overflow drops the oldest unread event so
// a stalled reader always resumes at the most recent activity.

export class Subscription implements AsyncIterable<MonitorEvent> {
  readonly id: number;
  private readonly capacity: number;
  private readonly queue: MonitorEvent[] = [];
  private waiters: Array<(result: IteratorResult<MonitorEvent>) => void> = [];
  private droppedCount = 0;
  private isClosed = false;
  private readonly onClose: (sub: Subscription) => void;

  constructor(id: number, capacity: number, onClose: (sub: Subscription) => void) {
    this.id = id;
    this.capacity = Math.max(1, capacity);
    this.onClose = onClose;
  }

  /** Events discarded because this subscriber fell behind. */
  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Called by the bus. Never blocks. */
  push(event: MonitorEvent): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter({ value: event, done: false });
      return;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
    this.queue.push(event);
  }

  /** Take everything queued right now without waiting. */
  drain(): MonitorEvent[] {
    return this.queue.splice(0, this.queue.length);
  }

  next(): Promise<IteratorResult<MonitorEvent>> {
    const event = this.queue.shift();
    if (event !== undefined) return Promise.resolve({ value: event, done: false });
    if (this.isClosed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.queue.length = 0;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter({ value: undefined, done: true });
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<MonitorEvent> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
