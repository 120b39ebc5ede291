/**
 * @fileoverview Bounded FIFO channel between the network task and the frame loop.
 *
 * Senders never wait: a full channel drops the item and reports a
 * QueueOverflowError, a closed one a ChannelClosedError. Receivers either
 * poll (`tryReceive`, frame loop) or await the next item (`receive`,
 * network task).
 */

import { ChannelClosedError, QueueOverflowError } from '@relay-four/framework-protocol';

/**
 * Outcome of a non-blocking send.
 */
export type SendResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: QueueOverflowError | ChannelClosedError };

/**
 * Producer half of a channel.
 */
export interface ChannelSender<T> {
  trySend(item: T): SendResult;
}

/**
 * Consumer half of a channel.
 */
export interface ChannelReceiver<T> {
  /** Next queued item, or undefined when the channel is empty */
  tryReceive(): T | undefined;
  /** Resolves with the next item, or undefined once the channel is closed and drained */
  receive(): Promise<T | undefined>;
  /** Stop accepting items; pending receives resolve with undefined */
  close(): void;
}

/**
 * Bounded, non-blocking, single-producer FIFO queue.
 */
export class BoundedChannel<T> implements ChannelSender<T>, ChannelReceiver<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(
    readonly name: string,
    readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of queued items */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  trySend(item: T): SendResult {
    if (this.closed) {
      return { ok: false, error: new ChannelClosedError(this.name) };
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return { ok: true };
    }

    if (this.items.length >= this.capacity) {
      return { ok: false, error: new QueueOverflowError(this.name, this.capacity) };
    }

    this.items.push(item);
    return { ok: true };
  }

  tryReceive(): T | undefined {
    return this.items.shift();
  }

  receive(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop accepting items. Pending receivers resolve with undefined;
   * queued items can still be received.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
