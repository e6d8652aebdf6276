/**
 * @fileoverview Serialization gate for outbound API calls.
 *
 * The crawl is strictly sequential: exactly one API call (including the
 * sleeps between its retry attempts) is in flight at any time. Every call the
 * {@link ApiClient} makes is funnelled through a single-slot p-queue, so even
 * callers that start several calls at once are served one after another in
 * submission order.
 *
 * ```
 *   client.call(...)  client.call(...)  client.call(...)
 *          \                |                /
 *           v               v               v
 *         [ RequestGate: p-queue, concurrency 1 ]
 *                           |
 *                           v
 *             attempt 1 -> sleep -> attempt 2 -> ...
 * ```
 *
 * @module services/queue
 */

import PQueue from "p-queue";

export class RequestGate {
  private readonly queue: PQueue;

  constructor() {
    this.queue = new PQueue({ concurrency: 1 });
  }

  /**
   * Run `fn` once every previously submitted task has settled.
   *
   * @throws Re-throws whatever `fn` throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    return gatedAdd<T>(this.queue, fn);
  }

  /** Resolves once the queue is empty and idle. */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }
}

/**
 * `throwOnTimeout: true` selects the `add()` overload typed `Promise<T>`;
 * the gate sets no queue timeout, so the flag changes nothing at run time.
 *
 * @internal
 */
async function gatedAdd<T>(queue: PQueue, fn: () => Promise<T>): Promise<T> {
  const result = await queue.add(fn, { throwOnTimeout: true });
  return result;
}
