/**
 * packages/core/src/runtime/mailbox.ts — Unbounded FIFO inbox.
 *
 * Queue destination for event links. `post()` never blocks; `receive()`
 * resolves with the oldest message, waiting when the queue is empty.
 *
 * Invariants:
 *   - Messages are received in post order.
 *   - At most one message is handed to each pending receive().
 *   - After close(), post() drops and pending/future receive() reject with
 *     LOOM_INVALID_STATE.
 */

import { LoomError } from "../abi.js";

type Waiter<T> = Readonly<{
  resolve: (msg: T) => void;
  reject: (err: Error) => void;
}>;

function closedError(): LoomError {
  return new LoomError("LOOM_INVALID_STATE", "mailbox closed");
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new LoomError("LOOM_INVALID_STATE", "mailbox receive aborted");
}

export class Mailbox<T> {
  private readonly queue: Array<Readonly<{ msg: T }>> = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue a message. Returns false when the mailbox is closed and the
   * message was dropped.
   */
  post(msg: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter.resolve(msg);
      return true;
    }
    this.queue.push({ msg });
    return true;
  }

  receive(signal?: AbortSignal): Promise<T> {
    const head = this.queue.shift();
    if (head !== undefined) return Promise.resolve(head.msg);
    if (this.closed) return Promise.reject(closedError());
    if (signal?.aborted) return Promise.reject(abortError(signal));

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        if (signal !== undefined) reject(abortError(signal));
      };
      const waiter: Waiter<T> = {
        resolve: (msg) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(msg);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Close the mailbox, dropping queued messages. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.reject(closedError());
    }
  }
}
