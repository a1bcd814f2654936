/**
 * packages/core/src/widgets/basic.ts — Leaf widget builders (button, textLabel).
 */

import { ID_ANY } from "../abi.js";
import { describeEvent } from "../events.js";
import { NO_LINK, callbackLink, linkEvent } from "../runtime/eventLink.js";
import { addSelf } from "./composition.js";
import type { Builder } from "./types.js";

/**
 * Label format: a function of the payload, or a template with `%s` (string),
 * `%d` (number), `%j` (JSON), `%o` (inspected value) and `%%`.
 */
export type LabelFormat = string | ((payload: unknown) => string);

const PLACEHOLDER_RE = /%[sdjo%]/g;

function formatString(payload: unknown): string {
  if (typeof payload === "string") return payload;
  if (typeof payload === "number" || typeof payload === "boolean") return String(payload);
  return describeEvent(payload);
}

function formatJson(payload: unknown): string {
  try {
    const json = JSON.stringify(payload);
    return json === undefined ? "undefined" : json;
  } catch {
    return "[Circular]";
  }
}

/**
 * Render `payload` through `format`. Every placeholder consumes the same
 * payload; a template without placeholders gets the payload appended after a
 * space.
 */
export function formatLabel(format: LabelFormat, payload: unknown): string {
  if (typeof format === "function") return format(payload);

  let substitutions = 0;
  const out = format.replace(PLACEHOLDER_RE, (token) => {
    if (token === "%%") return "%";
    substitutions++;
    switch (token) {
      case "%s":
        return formatString(payload);
      case "%d":
        return String(Number(payload));
      case "%j":
        return formatJson(payload);
      default:
        return describeEvent(payload);
    }
  });
  if (substitutions > 0) return out;
  return out.length === 0 ? formatString(payload) : `${out} ${formatString(payload)}`;
}

/**
 * Button with `label` and numeric `id`. Clicks are sent to the context's
 * event link as `button-clicked` events.
 */
export function button(label: string, id: number = ID_ANY): Builder {
  return (ctx) => {
    const { toolkit, parent, sizerFlags, eventLink } = ctx;
    const b = toolkit.createButton(parent, id, label);
    addSelf(toolkit, parent, b, sizerFlags);
    linkEvent(toolkit, b, eventLink, ["button-clicked"]);
    return NO_LINK;
  };
}

/**
 * Static text showing `initial` until the first payload arrives. Each payload
 * is rendered through `format`, then the label, its parent and its
 * grandparent are re-fit.
 */
export function textLabel(format: LabelFormat, initial = ""): Builder {
  return (ctx) => {
    const { toolkit, parent, sizerFlags } = ctx;
    const text = toolkit.createStaticText(parent, ID_ANY, initial);
    toolkit.wrap(text, -1);
    addSelf(toolkit, parent, text, sizerFlags);
    return callbackLink((payload) => {
      toolkit.setLabel(text, formatLabel(format, payload));
      toolkit.fit(text);
      toolkit.fit(parent);
      const grandparent = toolkit.getParent(parent);
      if (grandparent !== null) toolkit.fit(grandparent);
    });
  };
}
