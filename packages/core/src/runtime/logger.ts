/**
 * Minimal logging sink for the window loop and actors.
 *
 * The core does not depend on a runtime console; the default logger looks it
 * up on globalThis at call time.
 */

export type Logger = Readonly<{
  debug: (message: string) => void;
  warn: (message: string) => void;
}>;

type ConsoleLike = {
  log?: (msg: string) => void;
  debug?: (msg: string) => void;
  warn?: (msg: string) => void;
};

const LOG_PREFIX = "[loom]";

function globalConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export const defaultLogger: Logger = Object.freeze({
  debug: (message: string) => {
    const c = globalConsole();
    (c?.debug ?? c?.log)?.(`${LOG_PREFIX} ${message}`);
  },
  warn: (message: string) => {
    globalConsole()?.warn?.(`${LOG_PREFIX} ${message}`);
  },
});

export const silentLogger: Logger = Object.freeze({
  debug: () => {},
  warn: () => {},
});
