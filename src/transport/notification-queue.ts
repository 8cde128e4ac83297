/**
 * Queue of inbound transport chunks.
 *
 * The transport delivers data through callbacks. This queue buffers chunks
 * and provides a Promise-based interface for the consumption loop.
 */

import { BudLinkError } from '../exceptions';

interface PendingResolver {
  resolve: (data: Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * Queue for transport data chunks.
 *
 * - Buffers chunks that arrive before being requested
 * - Queues consumers that wait for future chunks
 * - Rejects waiting consumers when cleared
 */
export class NotificationQueue {
  private queue: Uint8Array[] = [];
  private pendingResolvers: PendingResolver[] = [];

  /**
   * Add a chunk to the queue.
   *
   * If a consumer is waiting, resolve the oldest one immediately.
   * Otherwise, buffer the chunk for future consumption.
   */
  enqueue(data: Uint8Array): void {
    const pending = this.pendingResolvers.shift();
    if (pending) {
      pending.resolve(data);
    } else {
      this.queue.push(data);
    }
  }

  /**
   * Get the next chunk, waiting until one arrives or the queue is cleared.
   */
  async dequeue(): Promise<Uint8Array> {
    const buffered = this.queue.shift();
    if (buffered) {
      return buffered;
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      this.pendingResolvers.push({ resolve, reject });
    });
  }

  /**
   * Take every buffered chunk without waiting.
   */
  drain(): Uint8Array[] {
    const chunks = this.queue;
    this.queue = [];
    return chunks;
  }

  /**
   * Clear the queue and reject all pending consumers.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    this.queue = [];

    for (const pending of this.pendingResolvers) {
      pending.reject(new BudLinkError(reason));
    }

    this.pendingResolvers = [];
  }
}
