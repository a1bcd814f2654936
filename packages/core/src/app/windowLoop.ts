/**
 * packages/core/src/app/windowLoop.ts — Top-level window loop.
 *
 * Two states, RUNNING and TERMINATED. A close-window event destroys the
 * frame and terminates; every other message is logged and ignored. There are
 * no other transitions. A message that cannot be rendered is still logged,
 * with a placeholder. A failing destroy terminates with LOOM_TOOLKIT_ERROR.
 */

import { LoomError, describeThrown, toolkitError } from "../abi.js";
import { describeEvent, isCloseEvent } from "../events.js";
import type { Logger } from "../runtime/logger.js";
import type { Mailbox } from "../runtime/mailbox.js";
import type { Toolkit, WidgetHandle } from "../toolkit.js";

export type WindowLoopState = "running" | "terminated";

export type WindowLoopOptions = Readonly<{
  toolkit: Toolkit;
  frame: WidgetHandle;
  inbox: Mailbox<unknown>;
  logger: Logger;
}>;

function describeMessage(message: unknown): string {
  try {
    return describeEvent(message);
  } catch (err: unknown) {
    return `[undescribable message: ${describeThrown(err)}]`;
  }
}

export class WindowLoop {
  private readonly toolkit: Toolkit;
  private readonly frame: WidgetHandle;
  private readonly inbox: Mailbox<unknown>;
  private readonly logger: Logger;
  private current: WindowLoopState = "running";
  private running = false;

  constructor(opts: WindowLoopOptions) {
    this.toolkit = opts.toolkit;
    this.frame = opts.frame;
    this.inbox = opts.inbox;
    this.logger = opts.logger;
  }

  get state(): WindowLoopState {
    return this.current;
  }

  /** Apply one message and return the resulting state. */
  handle(message: unknown): WindowLoopState {
    if (this.current === "terminated") return this.current;
    if (isCloseEvent(message)) {
      this.current = "terminated";
      try {
        this.toolkit.destroy(this.frame);
      } catch (err: unknown) {
        throw toolkitError("window close", err);
      }
      return this.current;
    }
    this.logger.debug(`Got ${describeMessage(message)}`);
    return this.current;
  }

  /**
   * Receive and handle messages until the window closes. Rejects with the
   * signal's reason when `signal` aborts first.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running) throw new LoomError("LOOM_INVALID_STATE", "window loop already running");
    if (this.current === "terminated") {
      throw new LoomError("LOOM_INVALID_STATE", "window loop already terminated");
    }
    this.running = true;
    try {
      while (this.current === "running") {
        const message = await this.inbox.receive(signal);
        this.handle(message);
      }
    } finally {
      this.running = false;
    }
  }
}
