import { type Plan, type TopFrameConfig, topFrame } from "@loom-ui/core";
import {
  type ConsoleToolkit,
  type ConsoleToolkitOptions,
  createConsoleToolkit,
} from "./backend/consoleToolkit.js";

export {
  ConsoleToolkit,
  createConsoleToolkit,
  parseConsoleCommand,
  type ConsoleCommand,
  type ConsoleToolkitOptions,
} from "./backend/consoleToolkit.js";

export type NodeTopFrameConfig = Readonly<
  Omit<TopFrameConfig, "toolkit"> & {
    /** Console toolkit options; ignored when `toolkit` is given. */
    console?: ConsoleToolkitOptions;
    /** Use this toolkit instead of creating a console toolkit. */
    toolkit?: ConsoleToolkit;
  }
>;

/**
 * Open a window on the console toolkit (stdin commands, stdout outline) and
 * resolve when it closes.
 */
export async function nodeTopFrame(config: NodeTopFrameConfig, plan: Plan): Promise<void> {
  const { console: consoleOpts, toolkit, ...frame } = config;
  await topFrame({ ...frame, toolkit: toolkit ?? createConsoleToolkit(consoleOpts) }, plan);
}
