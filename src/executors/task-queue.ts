/**
 * Bounded Task Queue
 *
 * FIFO queue with a fixed capacity, shared by many producers and many
 * consumers. Each item is delivered to exactly one consumer.
 */

import { CancelledError } from '../models/errors.js';

interface PendingProducer<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

type Consumer<T> = (item: T | undefined) => void;

export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly consumers: Consumer<T>[] = [];
  private readonly producers: PendingProducer<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue without waiting
   * @returns false when the queue is full or closed
   */
  tryEnqueue(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Enqueue, waiting for space
   * @returns false when the signal aborts or the queue closes first
   */
  enqueue(item: T, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.tryEnqueue(item)) {
      return Promise.resolve(true);
    }
    if (this.closed) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const pending: PendingProducer<T> = {
        item,
        resolve: (accepted) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(accepted);
        },
      };
      const onAbort = () => {
        const index = this.producers.indexOf(pending);
        if (index >= 0) {
          this.producers.splice(index, 1);
          pending.resolve(false);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.producers.push(pending);
    });
  }

  /**
   * Take the next item, waiting while the queue is empty
   * @returns undefined once the queue is closed and drained
   * @throws CancelledError when the signal aborts while waiting
   */
  dequeue(signal?: AbortSignal): Promise<T | undefined> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('dequeue cancelled'));
    }
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitProducer();
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve, reject) => {
      const consumer: Consumer<T> = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const onAbort = () => {
        const index = this.consumers.indexOf(consumer);
        if (index >= 0) {
          this.consumers.splice(index, 1);
          reject(new CancelledError('dequeue cancelled'));
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.consumers.push(consumer);
    });
  }

  /**
   * Stop accepting items. Waiting producers get false, waiting
   * consumers get undefined; queued items can still be dequeued.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const producer of this.producers.splice(0)) {
      producer.resolve(false);
    }
    for (const consumer of this.consumers.splice(0)) {
      consumer(undefined);
    }
  }

  /**
   * Remove and return everything still queued
   */
  drain(): T[] {
    return this.items.splice(0);
  }

  private admitProducer(): void {
    const producer = this.producers.shift();
    if (producer) {
      this.items.push(producer.item);
      producer.resolve(true);
    }
  }
}
