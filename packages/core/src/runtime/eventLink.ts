/**
 * packages/core/src/runtime/eventLink.ts — Event link destinations and dispatch.
 *
 * An event link is where a widget sends its payloads: nowhere, a callback, or
 * a mailbox. `passEvent` is the single dispatch point; every combinator goes
 * through it.
 */

import type { EventKind } from "../events.js";
import type { Toolkit, WidgetHandle } from "../toolkit.js";
import type { Mailbox } from "./mailbox.js";

/** Two-argument callback destination. The second argument is always null. */
export type LinkCallback = (payload: unknown, extra: null) => void;

export type EventLink =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "callback"; fn: LinkCallback }>
  | Readonly<{ kind: "queue"; mailbox: Mailbox<unknown> }>;

export const NO_LINK: EventLink = Object.freeze({ kind: "none" });

export function callbackLink(fn: LinkCallback): EventLink {
  return Object.freeze({ kind: "callback", fn });
}

export function queueLink(mailbox: Mailbox<unknown>): EventLink {
  return Object.freeze({ kind: "queue", mailbox });
}

/**
 * Deliver `payload` to `link`.
 *
 * - queue: posted to the mailbox, processed asynchronously by its owner
 * - callback: invoked synchronously with `(payload, null)`
 * - none: dropped
 */
export function passEvent(payload: unknown, link: EventLink): void {
  switch (link.kind) {
    case "queue":
      link.mailbox.post(payload);
      return;
    case "callback":
      link.fn(payload, null);
      return;
    case "none":
      return;
  }
}

/**
 * Connect `source` so that every occurrence of each kind in `kinds` is passed
 * to `link`. No-op for an empty kind list or a `none` link.
 */
export function linkEvent(
  toolkit: Toolkit,
  source: WidgetHandle,
  link: EventLink,
  kinds: readonly EventKind[],
): void {
  if (kinds.length === 0) return;
  if (link.kind === "none") return;
  for (const kind of kinds) {
    toolkit.connect(source, kind, (event) => passEvent(event, link));
  }
}

/**
 * Link that delivers each payload once to every link in `targets`, in order.
 */
export function fanOutLink(targets: readonly EventLink[]): EventLink {
  const frozen = Object.freeze([...targets]);
  return callbackLink((payload) => {
    for (const target of frozen) {
      passEvent(payload, target);
    }
  });
}
