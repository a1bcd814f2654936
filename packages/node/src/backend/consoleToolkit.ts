/**
 * Console Toolkit implementation for Node.js.
 *
 * Widget state lives in the headless widget table. Output is a text outline
 * of every shown frame, written after each batch of visible changes. Input is
 * line-oriented: each line is a command that fires toolkit events.
 *
 * Commands:
 *   click <id|label>    fire button-clicked on the first matching button
 *   fire <ref> <kind>   fire <kind> on the widget with handle ref <ref>
 *   tree                write the outline now
 *   close               fire close-window on the first frame
 *
 * End of input behaves like `close` on every live frame.
 */

import { type Interface, createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import {
  type EventKind,
  HeadlessToolkit,
  LoomError,
  type WidgetHandle,
  isEventKind,
  isLoomError,
} from "@loom-ui/core";

export type ConsoleToolkitOptions = Readonly<{
  /** Command source (default: process.stdin). */
  input?: Readable;
  /** Outline sink (default: process.stdout). */
  output?: Writable;
  /** Write the outline after visible changes (default: true). */
  echoTree?: boolean;
}>;

export type ConsoleCommand =
  | Readonly<{ kind: "click"; target: string | number }>
  | Readonly<{ kind: "fire"; ref: number; event: EventKind }>
  | Readonly<{ kind: "tree" }>
  | Readonly<{ kind: "close" }>
  | Readonly<{ kind: "empty" }>;

function parseRef(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const n = Number.parseInt(text, 10);
  return Number.isSafeInteger(n) ? n : null;
}

function invalidCommand(detail: string): never {
  throw new LoomError("LOOM_INVALID_PROPS", detail);
}

/**
 * Parse one input line. Throws LOOM_INVALID_PROPS for unknown or malformed
 * commands.
 */
export function parseConsoleCommand(line: string): ConsoleCommand {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: "empty" };
  const [head = "", ...rest] = trimmed.split(/\s+/);
  switch (head) {
    case "click": {
      const target = trimmed.slice(head.length).trim();
      if (target.length === 0) invalidCommand("click: missing button id or label");
      const asId = /^-?\d+$/.test(target) ? Number.parseInt(target, 10) : null;
      return { kind: "click", target: asId ?? target };
    }
    case "fire": {
      const [refText = "", kind = ""] = rest;
      const ref = parseRef(refText);
      if (ref === null) invalidCommand(`fire: bad widget ref ${JSON.stringify(refText)}`);
      if (!isEventKind(kind)) invalidCommand(`fire: unknown event kind ${JSON.stringify(kind)}`);
      return { kind: "fire", ref, event: kind };
    }
    case "tree":
      return { kind: "tree" };
    case "close":
      return { kind: "close" };
    default:
      return invalidCommand(`unknown command: ${trimmed}`);
  }
}

export class ConsoleToolkit extends HeadlessToolkit {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly echoTree: boolean;
  private rl: Interface | null = null;
  private stopping = false;
  private renderScheduled = false;

  constructor(opts: ConsoleToolkitOptions = {}) {
    super();
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
    this.echoTree = opts.echoTree ?? true;
  }

  override start(): void {
    super.start();
    this.stopping = false;
    const rl = createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => this.handleLine(line));
    rl.on("close", () => this.handleEndOfInput());
    this.rl = rl;
  }

  override stop(): void {
    this.stopping = true;
    const rl = this.rl;
    this.rl = null;
    rl?.close();
    super.stop();
  }

  override show(widget: WidgetHandle): void {
    super.show(widget);
    this.scheduleRender();
  }

  override setLabel(widget: WidgetHandle, text: string): void {
    super.setLabel(widget, text);
    this.scheduleRender();
  }

  override destroy(widget: WidgetHandle): void {
    super.destroy(widget);
    this.scheduleRender();
  }

  /** Outline of every live frame that has been shown. */
  render(): string {
    return this.frames()
      .filter((frame) => this.snapshot(frame).shown)
      .map((frame) => this.outline(frame))
      .join("\n");
  }

  /** Apply one command line. Exposed for embedding and tests. */
  handleLine(line: string): void {
    let command: ConsoleCommand;
    try {
      command = parseConsoleCommand(line);
    } catch (err: unknown) {
      if (!isLoomError(err)) throw err;
      this.writeLine(err.message);
      return;
    }
    this.apply(command);
  }

  private apply(command: ConsoleCommand): void {
    switch (command.kind) {
      case "empty":
        return;
      case "tree":
        this.writeTree();
        return;
      case "close": {
        const [frame] = this.frames();
        if (frame === undefined) {
          this.writeLine("close: no live frame");
          return;
        }
        this.fire(frame, "close-window");
        return;
      }
      case "click": {
        const button = this.findButton(command.target);
        if (button === null) {
          this.writeLine(`click: no button matches ${String(command.target)}`);
          return;
        }
        this.fire(button, "button-clicked");
        return;
      }
      case "fire": {
        const widget = this.widgetByRef(command.ref);
        if (widget === null) {
          this.writeLine(`fire: no widget #${String(command.ref)}`);
          return;
        }
        this.fire(widget, command.event);
        return;
      }
    }
  }

  private handleEndOfInput(): void {
    if (this.stopping || this.state !== "started") return;
    for (const frame of this.frames()) {
      this.fire(frame, "close-window");
    }
  }

  private scheduleRender(): void {
    if (!this.echoTree || this.renderScheduled) return;
    this.renderScheduled = true;
    setImmediate(() => {
      this.renderScheduled = false;
      if (this.state !== "started") return;
      this.writeTree();
    });
  }

  private writeTree(): void {
    const text = this.render();
    if (text.length > 0) this.writeLine(text);
  }

  private writeLine(text: string): void {
    this.output.write(`${text}\n`);
  }
}

export function createConsoleToolkit(opts: ConsoleToolkitOptions = {}): ConsoleToolkit {
  return new ConsoleToolkit(opts);
}
