// src/services/BroadcastRegistry.ts
import { STREAM_QUEUE_SIZE } from 'App/config/config';
import { CloseReason, StreamMessage } from 'App/types/stream';
import crypto from 'node:crypto';

export type NextResult =
  | { kind: 'message'; message: StreamMessage }
  | { kind: 'timeout' }
  | { kind: 'closed'; reason: CloseReason };

type Waiter = (result: NextResult) => void;

/**
 * One connected viewer: a bounded FIFO of pending messages with a single reader.
 */
export class Subscriber {
  readonly id = crypto.randomUUID();
  private readonly queue: StreamMessage[] = [];
  private waiter: Waiter | null = null;
  private closedWith: CloseReason | null = null;
  /** Messages dropped because the queue was full. */
  dropped = 0;

  constructor(readonly maxQueueSize: number = STREAM_QUEUE_SIZE) {}

  get closed(): boolean {
    return this.closedWith !== null;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Enqueues without blocking. Returns false when the message was dropped
   * (queue full or subscriber closed). A shutdown notice is always queued.
   */
  offer(message: StreamMessage): boolean {
    if (this.closedWith) return false;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake({ kind: 'message', message });
      return true;
    }
    if (this.queue.length >= this.maxQueueSize && message.type !== 'shutdown') {
      this.dropped += 1;
      return false;
    }
    this.queue.push(message);
    return true;
  }

  /**
   * Resolves with the next queued message, or `timeout` after `timeoutMs`
   * of silence, or `closed` once the subscriber is closed. Queued messages
   * are still handed out after close so a final shutdown notice can drain.
   */
  next(timeoutMs: number): Promise<NextResult> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve({ kind: 'message', message: queued });
    if (this.closedWith) {
      return Promise.resolve({ kind: 'closed', reason: this.closedWith });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Subscriber ${this.id} already has a reader`));
    }
    return new Promise<NextResult>(resolve => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: 'timeout' });
      }, timeoutMs);
      timer.unref();
      this.waiter = result => {
        clearTimeout(timer);
        resolve(result);
      };
    });
  }

  /** Idempotent; the first reason wins. */
  close(reason: CloseReason) {
    if (this.closedWith) return;
    this.closedWith = reason;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake({ kind: 'closed', reason });
    }
  }
}

/**
 * Owns the set of live subscribers and fans messages out to them.
 *
 * broadcast() never waits on a consumer: a subscriber whose queue is full simply
 * misses that message, so one stalled tab cannot hold back the sampler loop or
 * the other viewers.
 */
export class BroadcastRegistry {
  private readonly subscribers = new Map<string, Subscriber>();

  constructor(private readonly queueSize: number = STREAM_QUEUE_SIZE) {}

  get size(): number {
    return this.subscribers.size;
  }

  register(): Subscriber {
    const subscriber = new Subscriber(this.queueSize);
    this.subscribers.set(subscriber.id, subscriber);
    return subscriber;
  }

  /** Safe to call any number of times, from any teardown path. */
  unregister(subscriber: Subscriber): boolean {
    return this.subscribers.delete(subscriber.id);
  }

  has(subscriber: Subscriber): boolean {
    return this.subscribers.has(subscriber.id);
  }

  /** Returns how many subscribers accepted the message. */
  broadcast(message: StreamMessage): number {
    let delivered = 0;
    for (const subscriber of this.subscribers.values()) {
      if (subscriber.offer(message)) {
        delivered += 1;
      } else if (
        !subscriber.closed &&
        (subscriber.dropped === 1 || subscriber.dropped % 10 === 0)
      ) {
        console.warn(
          `[Stream] Subscriber ${subscriber.id} is falling behind, dropped update (${subscriber.dropped} so far)`,
        );
      }
    }
    return delivered;
  }

  /** Server-side cancellation of every live subscriber. */
  closeAll(reason: CloseReason = 'server') {
    for (const subscriber of this.subscribers.values()) {
      subscriber.close(reason);
    }
  }
}
