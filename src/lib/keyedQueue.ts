/**
 * ModDesk — src/lib/keyedQueue.ts
 * WHAT: Per-key promise chains; tasks sharing a key run one at a time, in arrival order.
 * WHY: A suggestion resolve or ticket close awaits the platform between reading and writing
 *      its record. Two events for the same key must not interleave across those awaits.
 * USAGE:
 *  const queue = new KeyedQueue();
 *  await queue.run(`suggestion:${messageId}`, async () => { ... });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` after every earlier task for `key` has settled. The returned
   * promise settles with the task's own result; a rejection does not poison
   * the chain for later tasks.
   */
  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    // Drop the entry once nothing newer has been chained behind it
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return next;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
