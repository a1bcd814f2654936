/**
 * packages/core/src/runtime/stateActor.ts — Fold-over-time actor behind mapState.
 *
 * Each actor owns a private state cell and an unbounded mailbox. Messages are
 * processed strictly in arrival order: next = step(message, state), the new
 * state is forwarded to the outbound link, then replaces the old one.
 *
 * The actor never touches toolkit objects itself. It receives the window
 * scope explicitly and stops when the scope's signal aborts.
 * A throw from `step` fails the whole window (LOOM_ACTOR_FAILED).
 */

import { LoomError, describeThrown } from "../abi.js";
import type { WindowScope } from "./context.js";
import { type EventLink, passEvent, queueLink } from "./eventLink.js";
import { Mailbox } from "./mailbox.js";

export type StateStep<S> = (message: unknown, state: S) => S;

export type StateActorOptions<S> = Readonly<{
  scope: WindowScope;
  step: StateStep<S>;
  initial: S;
  outbound: EventLink;
}>;

export type StateActorStatus = "running" | "stopped" | "failed";

export class StateActor<S> {
  private readonly scope: WindowScope;
  private readonly step: StateStep<S>;
  private readonly outbound: EventLink;
  private readonly inbox = new Mailbox<unknown>();
  private state: S;
  private currentStatus: StateActorStatus = "running";
  readonly done: Promise<void>;

  constructor(opts: StateActorOptions<S>) {
    this.scope = opts.scope;
    this.step = opts.step;
    this.outbound = opts.outbound;
    this.state = opts.initial;
    this.done = this.run();
  }

  /** Queue link addressing this actor's mailbox. */
  get link(): EventLink {
    return queueLink(this.inbox);
  }

  get status(): StateActorStatus {
    return this.currentStatus;
  }

  get snapshot(): S {
    return this.state;
  }

  private async run(): Promise<void> {
    const { signal } = this.scope;
    const onAbort = (): void => this.inbox.close();
    if (signal.aborted) {
      this.inbox.close();
      this.currentStatus = "stopped";
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      for (;;) {
        let message: unknown;
        try {
          message = await this.inbox.receive(signal);
        } catch {
          // mailbox closed or scope aborted: normal shutdown
          this.currentStatus = "stopped";
          return;
        }
        try {
          const next = this.step(message, this.state);
          passEvent(next, this.outbound);
          this.state = next;
        } catch (err: unknown) {
          this.currentStatus = "failed";
          this.inbox.close();
          this.scope.fail(
            new LoomError("LOOM_ACTOR_FAILED", `mapState actor threw: ${describeThrown(err)}`, {
              cause: err,
            }),
          );
          return;
        }
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
