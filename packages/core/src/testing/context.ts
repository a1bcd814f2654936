/**
 * packages/core/src/testing/context.ts — Build context for builder tests.
 *
 * Starts a TestToolkit, creates a frame with a box sizer and hands back a
 * root BuildContext, so a builder can be invoked without running topFrame.
 */

import { type Orientation, VERTICAL, toAxis } from "../abi.js";
import {
  type BuildContext,
  DEFAULT_SIZER_FLAGS,
  type SizerFlags,
  type WindowScope,
  createWindowScope,
} from "../runtime/context.js";
import { type EventLink, queueLink } from "../runtime/eventLink.js";
import { type Logger, silentLogger } from "../runtime/logger.js";
import { Mailbox } from "../runtime/mailbox.js";
import type { WidgetHandle } from "../toolkit.js";
import { TestToolkit } from "./toolkit.js";

export type TestContextOptions = Readonly<{
  toolkit?: TestToolkit;
  orientation?: Orientation;
  sizerFlags?: SizerFlags;
  /** Root event link (default: a queue link to `inbox`). */
  eventLink?: EventLink;
  logger?: Logger;
}>;

export type TestContext = Readonly<{
  toolkit: TestToolkit;
  frame: WidgetHandle;
  ctx: BuildContext;
  scope: WindowScope;
  /** Mailbox behind the default root link. */
  inbox: Mailbox<unknown>;
  /** Errors reported through the window scope. */
  failures: readonly Error[];
  /** Abort the scope and stop the toolkit. */
  dispose: () => void;
}>;

export function createTestContext(opts: TestContextOptions = {}): TestContext {
  const toolkit = opts.toolkit ?? new TestToolkit();
  const inbox = new Mailbox<unknown>();
  const failures: Error[] = [];
  const { scope, abort } = createWindowScope({
    logger: opts.logger ?? silentLogger,
    onFailure: (err) => failures.push(err),
  });

  toolkit.start();
  const frame = toolkit.createFrame("test", { width: 320, height: 240 });
  const axis = toAxis(opts.orientation ?? VERTICAL, "test frame");
  toolkit.setSizer(frame, toolkit.createBoxSizer(axis));

  const ctx: BuildContext = Object.freeze({
    toolkit,
    scope,
    parent: frame,
    sizerFlags: opts.sizerFlags ?? DEFAULT_SIZER_FLAGS,
    eventLink: opts.eventLink ?? queueLink(inbox),
  });

  return Object.freeze({
    toolkit,
    frame,
    ctx,
    scope,
    inbox,
    failures,
    dispose: () => {
      abort();
      inbox.close();
      toolkit.stop();
    },
  });
}
