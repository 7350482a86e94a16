import { ChannelClosedError } from '../errors';

/**
 * Bounded buffered channel with a single consumer.
 *
 * - `send` waits while the buffer is full and throws `ChannelClosedError` once
 *   the channel is closed.
 * - Iterating the channel yields buffered values in order and finishes after
 *   `close()` once the buffer is empty, so nothing sent before `close()` is lost.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waitingSenders: Array<() => void> = [];
  private waitingReceiver: (() => void) | null = null;
  private closed = false;
  private consumed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Expected `capacity` to be an integer >= 1');
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<void> {
    while (true) {
      if (this.closed) throw new ChannelClosedError();
      if (this.buffer.length < this.capacity) break;
      await new Promise<void>((resolve) => this.waitingSenders.push(resolve));
    }
    this.buffer.push(value);
    this.wakeReceiver();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeReceiver();
    for (const wake of this.waitingSenders.splice(0)) wake();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) throw new Error('channel already has a consumer');
    this.consumed = true;

    while (true) {
      if (this.buffer.length > 0) {
        const [value] = this.buffer.splice(0, 1);
        this.waitingSenders.shift()?.();
        yield value;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waitingReceiver = resolve;
      });
    }
  }

  private wakeReceiver(): void {
    const wake = this.waitingReceiver;
    this.waitingReceiver = null;
    wake?.();
  }
}

export default Channel;
