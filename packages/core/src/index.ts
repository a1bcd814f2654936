/**
 * @loom-ui/core
 *
 * Runtime-agnostic combinator layer for composing widget trees on top of a
 * GUI toolkit binding.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Toolkit constants + errors
// =============================================================================

export {
  HORIZONTAL,
  VERTICAL,
  LEFT,
  RIGHT,
  TOP,
  BOTTOM,
  ALL,
  ALIGN_CENTER_HORIZONTAL,
  ALIGN_CENTER_VERTICAL,
  ALIGN_CENTER,
  EXPAND,
  ID_ANY,
  type Axis,
  type Orientation,
  LoomError,
  type LoomErrorCode,
  isLoomError,
  toolkitError,
} from "./abi.js";

// =============================================================================
// Toolkit contract + events
// =============================================================================

export type {
  FrameSize,
  ResolvedSizerFlags,
  SizerHandle,
  SizerKind,
  Toolkit,
  ToolkitListener,
  WidgetHandle,
  WidgetKind,
} from "./toolkit.js";

export {
  EVENT_KINDS,
  type EventKind,
  type ToolkitEvent,
  describeEvent,
  isCloseEvent,
  isEventKind,
  isToolkitEvent,
} from "./events.js";

export {
  HeadlessToolkit,
  type HeadlessToolkitOptions,
  type HeadlessToolkitState,
  type SizerSnapshot,
  type ToolkitCall,
  type WidgetSnapshot,
  describeHandle,
} from "./toolkit/headless.js";

// =============================================================================
// Runtime: context, event links, mailbox, actors
// =============================================================================

export {
  type BuildContext,
  DEFAULT_SIZER_FLAGS,
  type SizerFlags,
  type SizerOption,
  type SizerOptionKey,
  type WindowScope,
  type WindowScopeController,
  createWindowScope,
  deriveContext,
  mergeSizerFlags,
  resolveSizerFlags,
} from "./runtime/context.js";

export {
  type EventLink,
  type LinkCallback,
  NO_LINK,
  callbackLink,
  fanOutLink,
  linkEvent,
  passEvent,
  queueLink,
} from "./runtime/eventLink.js";

export { Mailbox } from "./runtime/mailbox.js";
export { type Logger, defaultLogger, silentLogger } from "./runtime/logger.js";
export {
  StateActor,
  type StateActorOptions,
  type StateActorStatus,
  type StateStep,
} from "./runtime/stateActor.js";

// =============================================================================
// Widgets and combinators
// =============================================================================

export {
  type Builder,
  type ParallelPlan,
  type Plan,
  type PlanNode,
  type SequentialPlan,
  type SinglePlan,
  isPlanNode,
  par,
  seq,
  single,
} from "./widgets/types.js";

export {
  type Direction,
  SEQUENTIAL_WRAPPER_FLAGS,
  addSelf,
  comp,
  compose,
  composerFor,
  rcomp,
} from "./widgets/composition.js";

export { grid, panel } from "./widgets/containers.js";
export { type LabelFormat, button, formatLabel, textLabel } from "./widgets/basic.js";
export {
  type Maybe,
  always,
  catchEvents,
  just,
  map,
  mapState,
  maybe,
  modSizerFlags,
  never,
  nothing,
} from "./widgets/links.js";
export { ui } from "./widgets/ui.js";

// =============================================================================
// Top-level window
// =============================================================================

export { type TopFrameConfig, topFrame } from "./app/topFrame.js";
export { WindowLoop, type WindowLoopOptions, type WindowLoopState } from "./app/windowLoop.js";
