/**
 * packages/core/src/app/topFrame.ts — Top-level window entry point.
 *
 * Responsibilities:
 *   - Config validation
 *   - Toolkit lifecycle (start → build → show → loop → stop)
 *   - Window scope ownership: actors spawned by the plan stop on teardown
 *
 * Invariants:
 *   - The plan is built inside one toolkit batch
 *   - The loop terminates exactly once; the frame is destroyed on close
 *   - toolkit.stop() runs whenever toolkit.start() succeeded
 *   - A failing mapState actor rejects the returned promise (fail-fast),
 *     even when the window closed in the same turn
 */

import { LoomError, type Orientation, describeThrown, toAxis, toolkitError } from "../abi.js";
import type { ToolkitEvent } from "../events.js";
import { type BuildContext, DEFAULT_SIZER_FLAGS, createWindowScope } from "../runtime/context.js";
import { linkEvent, queueLink } from "../runtime/eventLink.js";
import { type Logger, defaultLogger } from "../runtime/logger.js";
import { Mailbox } from "../runtime/mailbox.js";
import type { Toolkit, WidgetHandle } from "../toolkit.js";
import { composerFor } from "../widgets/composition.js";
import type { Plan } from "../widgets/types.js";
import { WindowLoop } from "./windowLoop.js";

export type TopFrameConfig = Readonly<{
  toolkit: Toolkit;
  title: string;
  width: number;
  height: number;
  /** Signed: the sign picks placement direction, the magnitude the axis. */
  orientation: Orientation;
  /** Debug sink for unhandled window messages (default: console). */
  logger?: Logger;
  /** Aborting closes the window as if the user had closed it. */
  signal?: AbortSignal;
}>;

function invalidProps(detail: string): never {
  throw new LoomError("LOOM_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`topFrame: ${name} must be a positive integer`);
  return v;
}

function validateConfig(config: TopFrameConfig): void {
  if (typeof config.title !== "string") invalidProps("topFrame: title must be a string");
  requirePositiveInt("width", config.width);
  requirePositiveInt("height", config.height);
}

function failureOf(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new LoomError("LOOM_ACTOR_FAILED", `window failed: ${describeThrown(reason)}`);
}

function closeEventFor(frame: WidgetHandle): ToolkitEvent {
  return Object.freeze({ kind: "close-window", id: -1, source: frame });
}

/**
 * Open a top-level window, build `plan` into it and run the window loop
 * until the window is closed. Resolves after the toolkit has been stopped.
 */
export async function topFrame(config: TopFrameConfig, plan: Plan): Promise<void> {
  validateConfig(config);
  const { toolkit, title, width, height, orientation } = config;
  const axis = toAxis(orientation, "topFrame");
  const logger = config.logger ?? defaultLogger;
  const build = composerFor(orientation);

  const inbox = new Mailbox<unknown>();
  const failure = new AbortController();
  const { scope, abort } = createWindowScope({
    logger,
    onFailure: (err) => failure.abort(err),
  });

  try {
    toolkit.start();
  } catch (err: unknown) {
    throw toolkitError("toolkit.start", err);
  }

  let onExternalAbort: (() => void) | null = null;
  try {
    let frame: WidgetHandle;
    try {
      frame = toolkit.batch(() => {
        const fr = toolkit.createFrame(title, { width, height });
        toolkit.setSizer(fr, toolkit.createBoxSizer(axis));
        const root: BuildContext = Object.freeze({
          toolkit,
          scope,
          parent: fr,
          sizerFlags: DEFAULT_SIZER_FLAGS,
          eventLink: queueLink(inbox),
        });
        build(plan, root);
        linkEvent(toolkit, fr, queueLink(inbox), ["close-window"]);
        return fr;
      });
      toolkit.show(frame);
    } catch (err: unknown) {
      throw toolkitError("topFrame build", err);
    }

    const { signal } = config;
    if (signal !== undefined) {
      const closeFrame = frame;
      onExternalAbort = () => {
        inbox.post(closeEventFor(closeFrame));
      };
      if (signal.aborted) onExternalAbort();
      else signal.addEventListener("abort", onExternalAbort, { once: true });
    }

    const loop = new WindowLoop({ toolkit, frame, inbox, logger });
    await loop.run(failure.signal);
    // A failure can land in the same turn as the close that ended the loop.
    if (failure.signal.aborted) throw failureOf(failure.signal);
  } finally {
    if (onExternalAbort !== null) config.signal?.removeEventListener("abort", onExternalAbort);
    abort();
    inbox.close();
    toolkit.stop();
  }
}
