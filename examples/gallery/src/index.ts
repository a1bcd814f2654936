/**
 * Every combinator in one window. Type `tree` to print the outline,
 * `click <label>` to press a button, and close stdin to exit.
 */

import { ALL, EXPAND, HORIZONTAL, VERTICAL, isToolkitEvent, ui } from "@loom-ui/core";
import { nodeTopFrame } from "@loom-ui/node";

const keypad = ui.grid(
  3,
  ui.par(
    ...["1", "2", "3", "4", "5", "6", "7", "8", "9"].map((digit) =>
      ui.button(digit, Number.parseInt(digit, 10)),
    ),
  ),
);

const digits = ui.seq(
  keypad,
  ui.maybe((event) => (isToolkitEvent(event) ? ui.just(event.id) : ui.nothing())),
  ui.mapState((digit, entered: string) => `${entered}${String(digit)}`, ""),
  ui.textLabel("Entered: %s", "Entered:"),
);

const pointer = ui.panel(
  HORIZONTAL,
  ui.seq(
    ui.catchEvents(["enter-window", "leave-window"]),
    ui.map((event) => (isToolkitEvent(event) ? event.kind : "?")),
    ui.textLabel("Pointer: %s", "Pointer: outside"),
  ),
);

await nodeTopFrame(
  { title: "Gallery", width: 320, height: 280, orientation: VERTICAL },
  ui.modSizerFlags(
    [
      ["flag", ALL | EXPAND],
      ["border", 4],
    ],
    ui.seq(ui.panel(VERTICAL, digits), pointer, ui.never()),
  ),
);
