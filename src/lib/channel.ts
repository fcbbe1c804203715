/**
 * Bounded single-consumer channels for the engine's outward streams.
 *
 * Two policies share the buffering and wake-up logic:
 *
 * - {@link DroppingChannel}: `push` never waits. When the buffer is full the
 *   oldest item is discarded and counted; the next `receive` yields a summary
 *   item built by the channel's `summarize` callback before anything else.
 * - {@link BackpressureChannel}: `send` waits until the consumer makes room.
 *   Nothing is dropped; closing the channel moves waiting senders' items into
 *   the buffer so they can still be drained.
 *
 * `receive` resolves `undefined` only once the channel is closed and empty.
 */
abstract class BoundedChannel<T extends object> implements AsyncIterable<T> {
  protected buffer: T[] = [];
  protected receivers: Array<(item: T | undefined) => void> = [];
  protected closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got: ${capacity}`);
    }
  }

  receive(): Promise<T | undefined> {
    const item = this.take();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Take everything currently buffered without waiting
   */
  drain(): T[] {
    const items: T[] = [];
    let item = this.take();
    while (item !== undefined) {
      items.push(item);
      item = this.take();
    }
    return items;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.onClose();
    const receivers = this.receivers;
    this.receivers = [];
    receivers.forEach(resolve => resolve(this.take()));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }

  /**
   * Hand an item to a waiting receiver, or buffer it
   */
  protected deliver(item: T): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return;
    }
    this.buffer.push(item);
  }

  protected take(): T | undefined {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.afterTake();
    }
    return item;
  }

  protected afterTake(): void {}

  protected onClose(): void {}
}

export class DroppingChannel<T extends object> extends BoundedChannel<T> {
  private droppedCount = 0;

  constructor(capacity: number, private readonly summarize: (dropped: number) => T) {
    super(capacity);
  }

  /**
   * @returns False when the channel is closed and the item was discarded
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.receivers.length === 0 && this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.deliver(item);
    return true;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  protected override take(): T | undefined {
    if (this.droppedCount > 0) {
      const summary = this.summarize(this.droppedCount);
      this.droppedCount = 0;
      return summary;
    }
    return super.take();
  }
}

export class BackpressureChannel<T extends object> extends BoundedChannel<T> {
  private senders: Array<{ item: T; resolve: () => void }> = [];

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Cannot send on a closed channel'));
    }
    if (this.receivers.length > 0 || this.buffer.length < this.capacity) {
      this.deliver(item);
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.senders.push({ item, resolve });
    });
  }

  get waitingSenders(): number {
    return this.senders.length;
  }

  protected override afterTake(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.item);
      sender.resolve();
    }
  }

  protected override onClose(): void {
    const senders = this.senders;
    this.senders = [];
    for (const sender of senders) {
      this.buffer.push(sender.item);
      sender.resolve();
    }
  }
}
