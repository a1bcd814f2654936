/**
 * Event types delivered by a toolkit to connected listeners.
 */

import type { WidgetHandle } from "./toolkit.js";

export const EVENT_KINDS = Object.freeze([
  "button-clicked",
  "close-window",
  "left-down",
  "left-up",
  "right-down",
  "motion",
  "enter-window",
  "leave-window",
  "key-down",
  "key-up",
  "size",
] as const);

export type EventKind = (typeof EVENT_KINDS)[number];

/**
 * One toolkit event occurrence.
 *
 * `id` is the numeric id of the source widget at the time of the event
 * (see `Toolkit.setId`); `source` is its handle.
 */
export type ToolkitEvent = Readonly<{
  kind: EventKind;
  id: number;
  source: WidgetHandle;
}>;

const EVENT_KIND_SET: ReadonlySet<string> = new Set<string>(EVENT_KINDS);

export function isEventKind(value: string): value is EventKind {
  return EVENT_KIND_SET.has(value);
}

export function isToolkitEvent(value: unknown): value is ToolkitEvent {
  if (typeof value !== "object" || value === null) return false;
  return (
    "kind" in value &&
    typeof value.kind === "string" &&
    isEventKind(value.kind) &&
    "id" in value &&
    typeof value.id === "number" &&
    "source" in value &&
    typeof value.source === "object" &&
    value.source !== null
  );
}

export function isCloseEvent(value: unknown): value is ToolkitEvent {
  return isToolkitEvent(value) && value.kind === "close-window";
}

/**
 * Stable one-line rendering of an event payload, used by debug logging and
 * label formatting. An object that contains itself renders the repeat as
 * `[Circular]`.
 */
export function describeEvent(value: unknown): string {
  return describeValue(value, new WeakSet<object>());
}

function describeValue(value: unknown, ancestors: WeakSet<object>): string {
  if (isToolkitEvent(value)) {
    return `{${value.kind} id=${String(value.id)} source=${value.source.kind}#${String(value.source.ref)}}`;
  }
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value.toString()}n`;
    case "function":
      return "[function]";
    case "symbol":
      return value.toString();
    case "undefined":
      return "undefined";
    case "number":
    case "boolean":
      return String(value);
    default:
      break;
  }
  if (typeof value !== "object" || value === null) return String(value);
  if (ancestors.has(value)) return "[Circular]";
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((v: unknown) => describeValue(v, ancestors)).join(", ")}]`;
    }
    const entries = Object.entries(value);
    if (entries.length === 0) return "{}";
    return `{${entries.map(([k, v]) => `${k}: ${describeValue(v, ancestors)}`).join(", ")}}`;
  } finally {
    ancestors.delete(value);
  }
}
