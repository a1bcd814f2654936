/**
 * packages/core/src/widgets/composition.ts — Plan interpretation (comp / rcomp).
 *
 * Turns a composition plan into toolkit calls and returns the combined event
 * link of the subtree.
 *
 * Key concepts:
 *   - Sequential plans thread event links: each item's inbound link is the
 *     link produced by the item after it, so events flow first → last.
 *   - Forward sequential plans nest every item but the first in its own
 *     horizontal wrapper panel; wrappers that end up empty are destroyed.
 *   - Parallel plans build every item with the same context and fan received
 *     events out to all of them.
 *   - rcomp only changes traversal order (placement), never routing.
 */

import { ALIGN_CENTER_VERTICAL, ALL, HORIZONTAL, LoomError } from "../abi.js";
import {
  type BuildContext,
  type SizerFlags,
  deriveContext,
  resolveSizerFlags,
} from "../runtime/context.js";
import { type EventLink, fanOutLink } from "../runtime/eventLink.js";
import type { Toolkit, WidgetHandle } from "../toolkit.js";
import { type Plan, isPlanNode } from "./types.js";

export type Direction = "forward" | "reverse";

/** Sizer options used when attaching sequential wrapper panels. */
export const SEQUENTIAL_WRAPPER_FLAGS: SizerFlags = Object.freeze([
  Object.freeze(["flag", ALL | ALIGN_CENTER_VERTICAL] as const),
  Object.freeze(["border", 0] as const),
  Object.freeze(["proportion", 1] as const),
]);

function invalidPlan(detail: string): never {
  throw new LoomError("LOOM_INVALID_PLAN", detail);
}

/**
 * Attach `widget` to `parent`'s sizer (when it has one) and re-fit `parent`.
 * Exported for custom builders.
 */
export function addSelf(
  toolkit: Toolkit,
  parent: WidgetHandle,
  widget: WidgetHandle,
  flags: SizerFlags = [],
): void {
  const sizer = toolkit.getSizer(parent);
  if (sizer !== null) {
    toolkit.addToSizer(sizer, widget, resolveSizerFlags(flags));
  }
  toolkit.fit(parent);
}

function composeSequential(items: readonly Plan[], ctx: BuildContext): EventLink {
  const [head, ...rest] = items;
  if (head === undefined) invalidPlan("sequential plan must contain at least one item");

  const { toolkit, parent } = ctx;
  const kept: WidgetHandle[] = [];
  let link = ctx.eventLink;

  for (let i = rest.length - 1; i >= 0; i--) {
    const item = rest[i];
    if (item === undefined) continue;
    const wrapper = toolkit.createPanel(parent);
    toolkit.setSizer(wrapper, toolkit.createBoxSizer(HORIZONTAL));
    const inner = comp(item, deriveContext(ctx, { parent: wrapper, eventLink: link }));
    if (toolkit.getChildren(wrapper).length === 0) {
      toolkit.destroy(wrapper);
    } else {
      kept.unshift(wrapper);
    }
    link = inner;
  }

  const result = comp(head, deriveContext(ctx, { eventLink: link }));
  for (const wrapper of kept) {
    addSelf(toolkit, parent, wrapper, SEQUENTIAL_WRAPPER_FLAGS);
  }
  return result;
}

function composeSequentialReversed(items: readonly Plan[], ctx: BuildContext): EventLink {
  if (items.length === 0) invalidPlan("sequential plan must contain at least one item");
  let link = ctx.eventLink;
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item === undefined) continue;
    link = comp(item, deriveContext(ctx, { eventLink: link }));
  }
  return link;
}

function composeParallel(
  items: readonly Plan[],
  ctx: BuildContext,
  direction: Direction,
): EventLink {
  const ordered = direction === "forward" ? items : [...items].reverse();
  const links = ordered.map((item) => comp(item, ctx));
  return fanOutLink(links);
}

/**
 * Interpret `plan` in `direction` under `ctx`.
 */
export function compose(plan: Plan, ctx: BuildContext, direction: Direction): EventLink {
  if (typeof plan === "function") return plan(ctx);
  if (!isPlanNode(plan)) invalidPlan(`unsupported plan shape: ${typeof plan}`);

  switch (plan.kind) {
    case "single":
      return comp(plan.item, ctx);
    case "sequential": {
      const [only] = plan.items;
      if (plan.items.length === 1 && only !== undefined) return comp(only, ctx);
      return direction === "forward"
        ? composeSequential(plan.items, ctx)
        : composeSequentialReversed(plan.items, ctx);
    }
    case "parallel":
      return composeParallel(plan.items, ctx, direction);
  }
}

/** Build `plan` with forward placement. */
export function comp(plan: Plan, ctx: BuildContext): EventLink {
  return compose(plan, ctx, "forward");
}

/** Build `plan` with reversed placement. */
export function rcomp(plan: Plan, ctx: BuildContext): EventLink {
  return compose(plan, ctx, "reverse");
}

/** Pick comp or rcomp from the sign of a signed orientation. */
export function composerFor(orientation: number): (plan: Plan, ctx: BuildContext) => EventLink {
  return orientation > 0 ? comp : rcomp;
}
