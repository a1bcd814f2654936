/**
 * packages/core/src/runtime/context.ts — Build context threaded through a plan.
 *
 * A BuildContext is immutable. Combinators derive a modified copy for their
 * subordinates (new parent, merged sizer flags, new event link); siblings
 * never observe each other's overrides.
 */

import type { ResolvedSizerFlags, Toolkit, WidgetHandle } from "../toolkit.js";
import type { EventLink } from "./eventLink.js";
import type { Logger } from "./logger.js";

// =============================================================================
// Sizer options
// =============================================================================

export type SizerOptionKey = "proportion" | "flag" | "border";

export type SizerOption =
  | readonly ["proportion", number]
  | readonly ["flag", number]
  | readonly ["border", number];

/** Ordered option list. Later entries for a key override earlier ones. */
export type SizerFlags = readonly SizerOption[];

export const DEFAULT_SIZER_FLAGS: SizerFlags = Object.freeze([
  Object.freeze(["proportion", 1] as const),
  Object.freeze(["flag", 0] as const),
  Object.freeze(["border", 0] as const),
]);

const KEY_ORDER: Readonly<Record<SizerOptionKey, number>> = Object.freeze({
  border: 0,
  flag: 1,
  proportion: 2,
});

/**
 * Merge `overrides` into `base`. The result is ordered by key; for equal keys
 * the override entries come after the base entries, so they win on resolve.
 */
export function mergeSizerFlags(base: SizerFlags, overrides: SizerFlags): SizerFlags {
  const tagged = [
    ...base.map((opt, i) => ({ opt, source: 0, i })),
    ...overrides.map((opt, i) => ({ opt, source: 1, i })),
  ];
  tagged.sort((a, b) => {
    const byKey = KEY_ORDER[a.opt[0]] - KEY_ORDER[b.opt[0]];
    if (byKey !== 0) return byKey;
    if (a.source !== b.source) return a.source - b.source;
    return a.i - b.i;
  });
  return Object.freeze(tagged.map((t) => t.opt));
}

export function resolveSizerFlags(flags: SizerFlags): ResolvedSizerFlags {
  let proportion = 0;
  let flag = 0;
  let border = 0;
  for (const [key, value] of flags) {
    switch (key) {
      case "proportion":
        proportion = value;
        break;
      case "flag":
        flag = value;
        break;
      case "border":
        border = value;
        break;
    }
  }
  return Object.freeze({ proportion, flag, border });
}

// =============================================================================
// Window scope
// =============================================================================

/**
 * Per-window resources shared by the whole build tree and every actor it
 * spawns. Aborting the scope stops the window's actors.
 */
export type WindowScope = Readonly<{
  signal: AbortSignal;
  logger: Logger;
  /** Report an unrecoverable failure; the window loop terminates with it. */
  fail: (err: Error) => void;
}>;

export type WindowScopeController = Readonly<{
  scope: WindowScope;
  abort: () => void;
}>;

export function createWindowScope(
  opts: Readonly<{ logger: Logger; onFailure: (err: Error) => void }>,
): WindowScopeController {
  const controller = new AbortController();
  let failed = false;
  const scope: WindowScope = Object.freeze({
    signal: controller.signal,
    logger: opts.logger,
    fail: (err: Error) => {
      if (failed || controller.signal.aborted) return;
      failed = true;
      opts.onFailure(err);
    },
  });
  return Object.freeze({
    scope,
    abort: () => {
      if (!controller.signal.aborted) controller.abort();
    },
  });
}

// =============================================================================
// BuildContext
// =============================================================================

export type BuildContext = Readonly<{
  toolkit: Toolkit;
  scope: WindowScope;
  parent: WidgetHandle;
  sizerFlags: SizerFlags;
  eventLink: EventLink;
}>;

export function deriveContext(
  ctx: BuildContext,
  patch: Readonly<Partial<Pick<BuildContext, "parent" | "sizerFlags" | "eventLink">>>,
): BuildContext {
  return Object.freeze({ ...ctx, ...patch });
}
