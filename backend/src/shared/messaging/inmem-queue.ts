/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what the credential store enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the request completes
 *   to get all enqueued messages, then assert on their contents.
 * - Production: di.ts swaps this for a real transport adapter without touching services.
 *
 * RULES:
 * - Implements Queue only — services never see drain().
 * - JavaScript is single-threaded, so the array needs no locking.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages and clears the queue.
   */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
