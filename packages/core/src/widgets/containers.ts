/**
 * packages/core/src/widgets/containers.ts — Container builders (panel, grid).
 *
 * A container creates one panel under the current parent, builds its plan
 * with the panel as parent, then attaches itself to the parent's sizer with
 * the inherited sizer flags. The container's link is its plan's link.
 */

import { LoomError, type Orientation, toAxis } from "../abi.js";
import { deriveContext } from "../runtime/context.js";
import { addSelf, comp, composerFor } from "./composition.js";
import type { Builder, Plan } from "./types.js";

/**
 * Panel with a box sizer. A negative orientation reverses placement (right
 * to left for HORIZONTAL, bottom to top for VERTICAL).
 */
export function panel(orientation: Orientation, plan: Plan): Builder;
/** Panel without a sizer. */
export function panel(plan: Plan): Builder;
export function panel(orientationOrPlan: Orientation | Plan, plan?: Plan): Builder {
  if (typeof orientationOrPlan === "number") {
    const orientation = orientationOrPlan;
    const axis = toAxis(orientation, "panel");
    if (plan === undefined) {
      throw new LoomError("LOOM_INVALID_PLAN", "panel: missing plan");
    }
    const body = plan;
    const build = composerFor(orientation);
    return (ctx) => {
      const { toolkit, parent, sizerFlags } = ctx;
      const p = toolkit.createPanel(parent);
      toolkit.setSizer(p, toolkit.createBoxSizer(axis));
      const link = build(body, deriveContext(ctx, { parent: p }));
      addSelf(toolkit, parent, p, sizerFlags);
      return link;
    };
  }

  const inner = orientationOrPlan;
  return (ctx) => {
    const { toolkit, parent, sizerFlags } = ctx;
    const p = toolkit.createPanel(parent);
    const link = comp(inner, deriveContext(ctx, { parent: p }));
    addSelf(toolkit, parent, p, sizerFlags);
    return link;
  };
}

/**
 * Panel with a grid sizer of `columns` columns; rows grow as children are
 * added. Placement is always forward.
 */
export function grid(columns: number, plan: Plan): Builder {
  if (!Number.isInteger(columns) || columns <= 0) {
    throw new LoomError(
      "LOOM_INVALID_PROPS",
      `grid: columns must be a positive integer, got ${String(columns)}`,
    );
  }
  return (ctx) => {
    const { toolkit, parent, sizerFlags } = ctx;
    const p = toolkit.createPanel(parent);
    toolkit.setSizer(p, toolkit.createGridSizer(columns));
    const link = comp(plan, deriveContext(ctx, { parent: p }));
    addSelf(toolkit, parent, p, sizerFlags);
    return link;
  };
}
