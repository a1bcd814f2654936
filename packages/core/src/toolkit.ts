/**
 * Toolkit interface: the binding surface Loom drives.
 *
 * The combinator layer never renders, lays out, or decodes input. Everything
 * visible happens behind this interface; Loom only sequences the calls and
 * routes events.
 */

import type { Axis } from "./abi.js";
import type { EventKind, ToolkitEvent } from "./events.js";

// =============================================================================
// Handles
// =============================================================================

export type WidgetKind = "frame" | "panel" | "button" | "staticText";

/**
 * Opaque reference into the toolkit's object table.
 * Owned by the toolkit; Loom only passes it back.
 */
export type WidgetHandle = Readonly<{
  ref: number;
  kind: WidgetKind;
}>;

export type SizerKind = "box" | "grid";

export type SizerHandle = Readonly<{
  ref: number;
  kind: SizerKind;
}>;

/** Flags already resolved from a sizer option list. */
export type ResolvedSizerFlags = Readonly<{
  proportion: number;
  flag: number;
  border: number;
}>;

export type FrameSize = Readonly<{ width: number; height: number }>;

export type ToolkitListener = (event: ToolkitEvent) => void;

// =============================================================================
// Toolkit Interface
// =============================================================================

/**
 * Toolkit interface consumed by the combinators.
 *
 * Rules:
 * - Construction and sizer calls happen synchronously, on the thread that
 *   called `start()`.
 * - `connect()` listeners are invoked by the toolkit once per occurrence.
 * - `getSizer()` returns null for widgets without a sizer.
 * - `getParent()` returns null for top-level frames.
 */
export interface Toolkit {
  /** Initialize the toolkit. Must precede any other call. */
  start(): void;

  /** Tear down the toolkit and every widget it still owns. Idempotent. */
  stop(): void;

  /** Run `fn` with layout/repaint updates batched. */
  batch<T>(fn: () => T): T;

  createFrame(title: string, size: FrameSize): WidgetHandle;
  createPanel(parent: WidgetHandle): WidgetHandle;
  createButton(parent: WidgetHandle, id: number, label: string): WidgetHandle;
  createStaticText(parent: WidgetHandle, id: number, text: string): WidgetHandle;

  createBoxSizer(axis: Axis): SizerHandle;
  createGridSizer(columns: number): SizerHandle;
  setSizer(widget: WidgetHandle, sizer: SizerHandle): void;
  getSizer(widget: WidgetHandle): SizerHandle | null;
  addToSizer(sizer: SizerHandle, widget: WidgetHandle, flags: ResolvedSizerFlags): void;

  setLabel(widget: WidgetHandle, text: string): void;
  /** Wrap static text at `width` pixels; -1 disables wrapping. */
  wrap(widget: WidgetHandle, width: number): void;
  /** Recompute the widget's size from its sizer contents. */
  fit(widget: WidgetHandle): void;

  getParent(widget: WidgetHandle): WidgetHandle | null;
  getChildren(widget: WidgetHandle): readonly WidgetHandle[];
  setId(widget: WidgetHandle, id: number): void;

  show(widget: WidgetHandle): void;
  /** Destroy a widget and all of its children. */
  destroy(widget: WidgetHandle): void;

  connect(widget: WidgetHandle, kind: EventKind, listener: ToolkitListener): void;
}
