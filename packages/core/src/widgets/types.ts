/**
 * packages/core/src/widgets/types.ts — Builder and composition plan types.
 */

import type { BuildContext } from "../runtime/context.js";
import type { EventLink } from "../runtime/eventLink.js";

/**
 * One construction step: creates at most one toolkit widget under
 * `ctx.parent` and returns the event link its siblings or parent should
 * send payloads to.
 */
export type Builder = (ctx: BuildContext) => EventLink;

export type SinglePlan = Readonly<{ kind: "single"; item: Plan }>;

/** Items placed one after another; events flow from the first item to the last. */
export type SequentialPlan = Readonly<{ kind: "sequential"; items: readonly Plan[] }>;

/** Items share one context; received events fan out to every item. */
export type ParallelPlan = Readonly<{ kind: "parallel"; items: readonly Plan[] }>;

export type PlanNode = SinglePlan | SequentialPlan | ParallelPlan;

export type Plan = Builder | PlanNode;

export function single(item: Plan): SinglePlan {
  return Object.freeze({ kind: "single", item });
}

export function seq(...items: readonly Plan[]): SequentialPlan {
  return Object.freeze({ kind: "sequential", items: Object.freeze([...items]) });
}

export function par(...items: readonly Plan[]): ParallelPlan {
  return Object.freeze({ kind: "parallel", items: Object.freeze([...items]) });
}

export function isPlanNode(value: unknown): value is PlanNode {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  switch (value.kind) {
    case "single":
      return "item" in value;
    case "sequential":
    case "parallel":
      return "items" in value && Array.isArray(value.items);
    default:
      return false;
  }
}
