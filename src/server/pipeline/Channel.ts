/**
 * Channel - unbounded async FIFO between pipeline stages
 *
 * One receiver, any number of senders. Each sender handle is closed once; when the last open
 * sender closes, the receiver drains the remaining items and then reports end-of-stream.
 * Sending after the receiver has closed fails with ChannelClosedError.
 */

import { ChannelClosedError } from '../types/errors.js';

export interface Sender<T> {
  readonly channel: string;
  /** True once this handle has been closed */
  readonly closed: boolean;
  /**
   * Enqueue an item. Never blocks.
   * @throws ChannelClosedError if this handle is closed or the receiver is gone
   */
  send(item: T): void;
  /** New open handle onto the same channel */
  clone(): Sender<T>;
  /** Release this handle; idempotent */
  close(): void;
}

export interface Receiver<T> extends AsyncIterable<T> {
  readonly channel: string;
  /** Next item, or `done` once every sender has closed and the queue is empty */
  recv(): Promise<IteratorResult<T, undefined>>;
  /** Stop receiving; later sends fail */
  close(): void;
}

class ChannelState<T> {
  readonly queue: T[] = [];
  readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  openSenders = 0;
  receiverClosed = false;

  constructor(readonly name: string) {}

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this.queue.push(item);
    }
  }

  releaseSender(): void {
    this.openSenders--;
    if (this.openSenders === 0) {
      for (const waiter of this.waiters.splice(0)) {
        waiter({ done: true, value: undefined });
      }
    }
  }
}

class ChannelSender<T> implements Sender<T> {
  private released = false;

  constructor(private readonly state: ChannelState<T>) {
    state.openSenders++;
  }

  get channel(): string {
    return this.state.name;
  }

  get closed(): boolean {
    return this.released;
  }

  send(item: T): void {
    if (this.released) {
      throw new ChannelClosedError(this.state.name, 'sender_closed');
    }
    if (this.state.receiverClosed) {
      throw new ChannelClosedError(this.state.name, 'receiver_dropped');
    }
    this.state.push(item);
  }

  clone(): Sender<T> {
    if (this.released) {
      throw new ChannelClosedError(this.state.name, 'sender_closed');
    }
    return new ChannelSender(this.state);
  }

  close(): void {
    if (this.released) return;
    this.released = true;
    this.state.releaseSender();
  }
}

class ChannelReceiver<T> implements Receiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  get channel(): string {
    return this.state.name;
  }

  recv(): Promise<IteratorResult<T, undefined>> {
    if (this.state.queue.length > 0) {
      const value = this.state.queue[0];
      this.state.queue.shift();
      return Promise.resolve({ done: false, value });
    }
    if (this.state.openSenders === 0 || this.state.receiverClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.state.waiters.push(resolve);
    });
  }

  close(): void {
    this.state.receiverClosed = true;
    this.state.queue.length = 0;
    for (const waiter of this.state.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.recv();
      if (result.done) return;
      yield result.value;
    }
  }
}

/**
 * Create a channel and return its first sender and its receiver
 */
export function createChannel<T>(name: string): [Sender<T>, Receiver<T>] {
  const state = new ChannelState<T>(name);
  return [new ChannelSender(state), new ChannelReceiver(state)];
}
