/**
 * packages/core/src/widgets/ui.ts — Builder namespace.
 *
 * Groups every builder and plan constructor under one object so a window can
 * be declared without a long import list.
 *
 * @example
 * ```ts
 * const plan = ui.seq(
 *   ui.button("+1", 1),
 *   ui.mapState((_evt, n: number) => n + 1, 0),
 *   ui.textLabel("Count: %d", "Count: 0"),
 * );
 * ```
 */

import { button, textLabel } from "./basic.js";
import { grid, panel } from "./containers.js";
import {
  always,
  catchEvents,
  just,
  map,
  mapState,
  maybe,
  modSizerFlags,
  never,
  nothing,
} from "./links.js";
import { par, seq, single } from "./types.js";

export const ui = Object.freeze({
  // plans
  single,
  seq,
  par,
  // containers
  panel,
  grid,
  // leaves
  button,
  textLabel,
  // event shaping
  map,
  maybe,
  mapState,
  always,
  never,
  catchEvents,
  modSizerFlags,
  just,
  nothing,
});
