import { setImmediate as nextMacrotask } from "node:timers/promises";

/**
 * Let queued work run: drains the microtask queue and one macrotask turn,
 * `turns` times. Mailbox deliveries and actor steps complete within a turn.
 */
export async function settle(turns = 1): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await nextMacrotask();
  }
}

export type Recorder<T> = Readonly<{
  values: readonly T[];
  push: (value: T) => void;
  clear: () => void;
}>;

/** Append-only value log, handy as a callback destination. */
export function createRecorder<T = unknown>(): Recorder<T> {
  const values: T[] = [];
  return Object.freeze({
    values,
    push: (value: T) => {
      values.push(value);
    },
    clear: () => {
      values.length = 0;
    },
  });
}
