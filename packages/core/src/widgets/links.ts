/**
 * packages/core/src/widgets/links.ts — Event-shaping combinators.
 *
 * These builders create no widgets (catchEvents only subscribes the parent).
 * They return a link that transforms or filters payloads before passing them
 * on to the context's event link.
 */

import type { EventKind } from "../events.js";
import { type SizerFlags, deriveContext, mergeSizerFlags } from "../runtime/context.js";
import { NO_LINK, callbackLink, linkEvent, passEvent } from "../runtime/eventLink.js";
import { StateActor, type StateStep } from "../runtime/stateActor.js";
import { comp } from "./composition.js";
import type { Builder, Plan } from "./types.js";

// =============================================================================
// Maybe
// =============================================================================

export type Maybe<T> = Readonly<{ kind: "just"; value: T }> | Readonly<{ kind: "nothing" }>;

const NOTHING: Maybe<never> = Object.freeze({ kind: "nothing" });

export function just<T>(value: T): Maybe<T> {
  return Object.freeze({ kind: "just", value });
}

export function nothing<T = never>(): Maybe<T> {
  return NOTHING;
}

// =============================================================================
// Combinators
// =============================================================================

/** Forward `f(payload)` for every payload. */
export function map<T>(f: (payload: unknown) => T): Builder {
  return ({ eventLink }) => callbackLink((payload) => passEvent(f(payload), eventLink));
}

/** Forward the value only when `f` returns `just(value)`. */
export function maybe<T>(f: (payload: unknown) => Maybe<T>): Builder {
  return ({ eventLink }) =>
    callbackLink((payload) => {
      const result = f(payload);
      if (result.kind === "just") passEvent(result.value, eventLink);
    });
}

/** Pass every payload through unchanged. */
export function always(): Builder {
  return ({ eventLink }) => eventLink;
}

/** Drop every payload. */
export function never(): Builder {
  return () => callbackLink(() => {});
}

/**
 * Fold payloads over time. Each payload produces `next = f(payload, state)`,
 * which is forwarded and kept as the new state. Runs as a separate actor
 * until the window closes.
 */
export function mapState<S>(f: StateStep<S>, initial: S): Builder {
  return ({ scope, eventLink }) => {
    const actor = new StateActor<S>({ scope, step: f, initial, outbound: eventLink });
    return actor.link;
  };
}

/**
 * Subscribe the parent widget to `kinds`, forwarding each occurrence to the
 * context's event link. With `id`, the parent's id is set first so that the
 * forwarded events carry it.
 */
export function catchEvents(kinds: readonly EventKind[], id?: number): Builder {
  const frozen = Object.freeze([...kinds]);
  return ({ toolkit, parent, eventLink }) => {
    if (id !== undefined) toolkit.setId(parent, id);
    linkEvent(toolkit, parent, eventLink, frozen);
    return NO_LINK;
  };
}

/**
 * Build `plan` with `overrides` merged into the inherited sizer flags.
 * Placement is always forward.
 */
export function modSizerFlags(overrides: SizerFlags, plan: Plan): Builder {
  return (ctx) =>
    comp(plan, deriveContext(ctx, { sizerFlags: mergeSizerFlags(ctx.sizerFlags, overrides) }));
}
