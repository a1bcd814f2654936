/**
 * packages/core/src/toolkit/headless.ts — In-memory Toolkit implementation.
 *
 * Keeps the widget and sizer tables a real toolkit would keep, without any
 * rendering. Used as the base of the test toolkit and the console toolkit.
 *
 * Invariants:
 *   - Handles are never reused within one start/stop cycle.
 *   - getChildren() lists live children in creation order.
 *   - destroy() removes the widget (and its subtree) from its parent and
 *     from every sizer that holds it.
 *   - Every Toolkit call outside start()..stop() throws LOOM_INVALID_STATE.
 */

import { type Axis, HORIZONTAL, LoomError } from "../abi.js";
import type { EventKind, ToolkitEvent } from "../events.js";
import type {
  FrameSize,
  ResolvedSizerFlags,
  SizerHandle,
  Toolkit,
  ToolkitListener,
  WidgetHandle,
  WidgetKind,
} from "../toolkit.js";

export type HeadlessToolkitState = "idle" | "started" | "stopped";

export type ToolkitCall = Readonly<{
  method: keyof Toolkit;
  args: readonly unknown[];
}>;

export type HeadlessToolkitOptions = Readonly<{
  /** Called before every Toolkit method runs. */
  onCall?: (call: ToolkitCall) => void;
}>;

export type SizerSnapshot =
  | Readonly<{ kind: "box"; ref: number; axis: Axis }>
  | Readonly<{ kind: "grid"; ref: number; columns: number }>;

export type WidgetSnapshot = Readonly<{
  ref: number;
  kind: WidgetKind;
  id: number;
  label: string;
  shown: boolean;
  fitCount: number;
  wrapWidth: number | null;
  size: FrameSize | null;
  sizer: SizerSnapshot | null;
  /** Flags this widget was attached to its parent's sizer with, if attached. */
  flags: ResolvedSizerFlags | null;
  /** Children in visual order: sizer items first, then unattached children. */
  children: readonly WidgetSnapshot[];
}>;

type SizerItem = { widget: WidgetRecord; flags: ResolvedSizerFlags };

type SizerRecord = {
  handle: SizerHandle;
  axis: Axis;
  columns: number;
  items: SizerItem[];
  owner: WidgetRecord | null;
};

type WidgetRecord = {
  handle: WidgetHandle;
  id: number;
  label: string;
  size: FrameSize | null;
  parent: WidgetRecord | null;
  children: WidgetRecord[];
  sizer: SizerRecord | null;
  shown: boolean;
  fitCount: number;
  wrapWidth: number | null;
  alive: boolean;
  listeners: Map<EventKind, ToolkitListener[]>;
};

function invalidState(detail: string): never {
  throw new LoomError("LOOM_INVALID_STATE", detail);
}

export class HeadlessToolkit implements Toolkit {
  private readonly onCall: ((call: ToolkitCall) => void) | undefined;
  private readonly widgets = new Map<number, WidgetRecord>();
  private readonly sizers = new Map<number, SizerRecord>();
  private nextWidgetRef = 1;
  private nextSizerRef = 1;
  private nextAutoId = -100;
  private batchDepth = 0;
  private current: HeadlessToolkitState = "idle";

  constructor(opts: HeadlessToolkitOptions = {}) {
    this.onCall = opts.onCall;
  }

  get state(): HeadlessToolkitState {
    return this.current;
  }

  get inBatch(): boolean {
    return this.batchDepth > 0;
  }

  // ---------------------------------------------------------------------------
  // Toolkit
  // ---------------------------------------------------------------------------

  start(): void {
    this.trace("start", []);
    if (this.current === "started") invalidState("toolkit already started");
    this.widgets.clear();
    this.sizers.clear();
    this.nextWidgetRef = 1;
    this.nextSizerRef = 1;
    this.nextAutoId = -100;
    this.current = "started";
  }

  stop(): void {
    this.trace("stop", []);
    if (this.current !== "started") return;
    for (const w of this.widgets.values()) {
      w.alive = false;
      w.listeners.clear();
    }
    this.widgets.clear();
    this.sizers.clear();
    this.current = "stopped";
  }

  batch<T>(fn: () => T): T {
    this.trace("batch", []);
    this.requireStarted("batch");
    this.batchDepth++;
    try {
      return fn();
    } finally {
      this.batchDepth--;
    }
  }

  createFrame(title: string, size: FrameSize): WidgetHandle {
    this.trace("createFrame", [title, size]);
    this.requireStarted("createFrame");
    const w = this.allocWidget("frame", null, this.autoId(), title);
    w.size = Object.freeze({ width: size.width, height: size.height });
    return w.handle;
  }

  createPanel(parent: WidgetHandle): WidgetHandle {
    this.trace("createPanel", [parent]);
    return this.allocWidget("panel", this.live(parent, "createPanel"), this.autoId(), "").handle;
  }

  createButton(parent: WidgetHandle, id: number, label: string): WidgetHandle {
    this.trace("createButton", [parent, id, label]);
    const p = this.live(parent, "createButton");
    return this.allocWidget("button", p, id < 0 ? this.autoId() : id, label).handle;
  }

  createStaticText(parent: WidgetHandle, id: number, text: string): WidgetHandle {
    this.trace("createStaticText", [parent, id, text]);
    const p = this.live(parent, "createStaticText");
    return this.allocWidget("staticText", p, id < 0 ? this.autoId() : id, text).handle;
  }

  createBoxSizer(axis: Axis): SizerHandle {
    this.trace("createBoxSizer", [axis]);
    this.requireStarted("createBoxSizer");
    return this.allocSizer("box", axis, 0).handle;
  }

  createGridSizer(columns: number): SizerHandle {
    this.trace("createGridSizer", [columns]);
    this.requireStarted("createGridSizer");
    if (!Number.isInteger(columns) || columns <= 0) {
      throw new LoomError("LOOM_INVALID_PROPS", "createGridSizer: columns must be positive");
    }
    return this.allocSizer("grid", HORIZONTAL, columns).handle;
  }

  setSizer(widget: WidgetHandle, sizer: SizerHandle): void {
    this.trace("setSizer", [widget, sizer]);
    const w = this.live(widget, "setSizer");
    const s = this.sizerRecord(sizer, "setSizer");
    if (s.owner !== null && s.owner !== w) invalidState("setSizer: sizer already owned");
    if (w.sizer !== null) w.sizer.owner = null;
    s.owner = w;
    w.sizer = s;
  }

  getSizer(widget: WidgetHandle): SizerHandle | null {
    this.trace("getSizer", [widget]);
    return this.live(widget, "getSizer").sizer?.handle ?? null;
  }

  addToSizer(sizer: SizerHandle, widget: WidgetHandle, flags: ResolvedSizerFlags): void {
    this.trace("addToSizer", [sizer, widget, flags]);
    const s = this.sizerRecord(sizer, "addToSizer");
    const w = this.live(widget, "addToSizer");
    if (s.items.some((item) => item.widget === w)) {
      invalidState(`addToSizer: ${describeHandle(widget)} already in sizer`);
    }
    s.items.push({ widget: w, flags: Object.freeze({ ...flags }) });
  }

  setLabel(widget: WidgetHandle, text: string): void {
    this.trace("setLabel", [widget, text]);
    this.live(widget, "setLabel").label = text;
  }

  wrap(widget: WidgetHandle, width: number): void {
    this.trace("wrap", [widget, width]);
    const w = this.live(widget, "wrap");
    w.wrapWidth = width < 0 ? null : width;
  }

  fit(widget: WidgetHandle): void {
    this.trace("fit", [widget]);
    this.live(widget, "fit").fitCount++;
  }

  getParent(widget: WidgetHandle): WidgetHandle | null {
    this.trace("getParent", [widget]);
    return this.live(widget, "getParent").parent?.handle ?? null;
  }

  getChildren(widget: WidgetHandle): readonly WidgetHandle[] {
    this.trace("getChildren", [widget]);
    return Object.freeze(this.live(widget, "getChildren").children.map((c) => c.handle));
  }

  setId(widget: WidgetHandle, id: number): void {
    this.trace("setId", [widget, id]);
    this.live(widget, "setId").id = id;
  }

  show(widget: WidgetHandle): void {
    this.trace("show", [widget]);
    this.live(widget, "show").shown = true;
  }

  destroy(widget: WidgetHandle): void {
    this.trace("destroy", [widget]);
    const w = this.live(widget, "destroy");
    if (w.parent !== null) {
      const siblings = w.parent.children;
      const idx = siblings.indexOf(w);
      if (idx >= 0) siblings.splice(idx, 1);
    }
    this.release(w);
  }

  connect(widget: WidgetHandle, kind: EventKind, listener: ToolkitListener): void {
    this.trace("connect", [widget, kind]);
    const w = this.live(widget, "connect");
    const list = w.listeners.get(kind);
    if (list === undefined) w.listeners.set(kind, [listener]);
    else list.push(listener);
  }

  // ---------------------------------------------------------------------------
  // Inspection and event injection
  // ---------------------------------------------------------------------------

  isAlive(widget: WidgetHandle): boolean {
    return this.widgets.get(widget.ref)?.alive === true;
  }

  /** Live widgets in creation order. */
  allWidgets(): readonly WidgetHandle[] {
    return Object.freeze([...this.widgets.values()].map((w) => w.handle));
  }

  /** Live top-level frames in creation order. */
  frames(): readonly WidgetHandle[] {
    return Object.freeze(
      [...this.widgets.values()].filter((w) => w.parent === null).map((w) => w.handle),
    );
  }

  widgetByRef(ref: number): WidgetHandle | null {
    return this.widgets.get(ref)?.handle ?? null;
  }

  labelOf(widget: WidgetHandle): string {
    return this.widgetRecord(widget, "labelOf").label;
  }

  idOf(widget: WidgetHandle): number {
    return this.widgetRecord(widget, "idOf").id;
  }

  /**
   * First live button, in creation order, whose label (string target) or id
   * (numeric target) matches.
   */
  findButton(target: string | number): WidgetHandle | null {
    for (const w of this.widgets.values()) {
      if (w.handle.kind !== "button") continue;
      if (typeof target === "number" ? w.id === target : w.label === target) return w.handle;
    }
    return null;
  }

  listenerCount(widget: WidgetHandle, kind: EventKind): number {
    return this.widgets.get(widget.ref)?.listeners.get(kind)?.length ?? 0;
  }

  /**
   * Deliver `kind` on `widget` to every connected listener, in connection
   * order. Returns the number of listeners invoked.
   */
  fire(widget: WidgetHandle, kind: EventKind): number {
    const w = this.widgetRecord(widget, "fire");
    const listeners = w.listeners.get(kind);
    if (listeners === undefined || listeners.length === 0) return 0;
    const event: ToolkitEvent = Object.freeze({ kind, id: w.id, source: w.handle });
    const snapshot = [...listeners];
    for (const listener of snapshot) {
      listener(event);
    }
    return snapshot.length;
  }

  snapshot(widget: WidgetHandle): WidgetSnapshot {
    return this.snapshotOf(this.widgetRecord(widget, "snapshot"), null);
  }

  /** Indented one-line-per-widget rendering of `widget`'s subtree. */
  outline(widget: WidgetHandle): string {
    const lines: string[] = [];
    const walk = (node: WidgetSnapshot, depth: number): void => {
      lines.push(`${"  ".repeat(depth)}${describeSnapshot(node)}`);
      for (const child of node.children) walk(child, depth + 1);
    };
    walk(this.snapshot(widget), 0);
    return lines.join("\n");
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private trace(method: keyof Toolkit, args: readonly unknown[]): void {
    this.onCall?.(Object.freeze({ method, args: Object.freeze([...args]) }));
  }

  private requireStarted(method: string): void {
    if (this.current !== "started") invalidState(`${method}: toolkit is ${this.current}`);
  }

  private autoId(): number {
    const id = this.nextAutoId;
    this.nextAutoId--;
    return id;
  }

  private allocWidget(
    kind: WidgetKind,
    parent: WidgetRecord | null,
    id: number,
    label: string,
  ): WidgetRecord {
    const handle: WidgetHandle = Object.freeze({ ref: this.nextWidgetRef, kind });
    this.nextWidgetRef++;
    const w: WidgetRecord = {
      handle,
      id,
      label,
      size: null,
      parent,
      children: [],
      sizer: null,
      shown: false,
      fitCount: 0,
      wrapWidth: null,
      alive: true,
      listeners: new Map(),
    };
    this.widgets.set(handle.ref, w);
    parent?.children.push(w);
    return w;
  }

  private allocSizer(kind: "box" | "grid", axis: Axis, columns: number): SizerRecord {
    const handle: SizerHandle = Object.freeze({ ref: this.nextSizerRef, kind });
    this.nextSizerRef++;
    const s: SizerRecord = { handle, axis, columns, items: [], owner: null };
    this.sizers.set(handle.ref, s);
    return s;
  }

  private live(widget: WidgetHandle, method: string): WidgetRecord {
    this.requireStarted(method);
    return this.widgetRecord(widget, method);
  }

  private widgetRecord(widget: WidgetHandle, method: string): WidgetRecord {
    const w = this.widgets.get(widget.ref);
    if (w === undefined || !w.alive) {
      invalidState(`${method}: unknown or destroyed widget ${describeHandle(widget)}`);
    }
    return w;
  }

  private sizerRecord(sizer: SizerHandle, method: string): SizerRecord {
    this.requireStarted(method);
    const s = this.sizers.get(sizer.ref);
    if (s === undefined) invalidState(`${method}: unknown sizer ${sizer.kind}#${sizer.ref}`);
    return s;
  }

  private release(w: WidgetRecord): void {
    for (const child of w.children) this.release(child);
    w.children.length = 0;
    w.alive = false;
    w.listeners.clear();
    for (const s of this.sizers.values()) {
      const idx = s.items.findIndex((item) => item.widget === w);
      if (idx >= 0) s.items.splice(idx, 1);
    }
    if (w.sizer !== null) {
      this.sizers.delete(w.sizer.handle.ref);
      w.sizer = null;
    }
    this.widgets.delete(w.handle.ref);
  }

  private snapshotOf(w: WidgetRecord, flags: ResolvedSizerFlags | null): WidgetSnapshot {
    const ordered: Array<{ widget: WidgetRecord; flags: ResolvedSizerFlags | null }> = [];
    const attached = new Set<WidgetRecord>();
    if (w.sizer !== null) {
      for (const item of w.sizer.items) {
        if (item.widget.parent !== w) continue;
        ordered.push({ widget: item.widget, flags: item.flags });
        attached.add(item.widget);
      }
    }
    for (const child of w.children) {
      if (!attached.has(child)) ordered.push({ widget: child, flags: null });
    }
    return Object.freeze({
      ref: w.handle.ref,
      kind: w.handle.kind,
      id: w.id,
      label: w.label,
      shown: w.shown,
      fitCount: w.fitCount,
      wrapWidth: w.wrapWidth,
      size: w.size,
      sizer: w.sizer === null ? null : sizerSnapshot(w.sizer),
      flags,
      children: Object.freeze(ordered.map((o) => this.snapshotOf(o.widget, o.flags))),
    });
  }
}

function sizerSnapshot(s: SizerRecord): SizerSnapshot {
  if (s.handle.kind === "grid") {
    return Object.freeze({ kind: "grid", ref: s.handle.ref, columns: s.columns });
  }
  return Object.freeze({ kind: "box", ref: s.handle.ref, axis: s.axis });
}

export function describeHandle(widget: WidgetHandle): string {
  return `${widget.kind}#${String(widget.ref)}`;
}

function describeSizer(s: SizerSnapshot): string {
  if (s.kind === "grid") return `[grid ${String(s.columns)} cols]`;
  return `[box ${s.axis === HORIZONTAL ? "horizontal" : "vertical"}]`;
}

function describeSnapshot(node: WidgetSnapshot): string {
  const parts = [`${node.kind}#${String(node.ref)}`];
  if (node.label.length > 0) parts.push(JSON.stringify(node.label));
  if (node.size !== null) parts.push(`${String(node.size.width)}x${String(node.size.height)}`);
  if (node.kind === "button" && node.id >= 0) parts.push(`(id ${String(node.id)})`);
  if (node.sizer !== null) parts.push(describeSizer(node.sizer));
  return parts.join(" ");
}
