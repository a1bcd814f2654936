/**
 * Toolkit constants and error types for Loom.
 *
 * Numeric values match the toolkit binding's own constants so that flags and
 * orientations can be passed through without translation.
 */

// =============================================================================
// Orientation
// =============================================================================

export const HORIZONTAL = 4;
export const VERTICAL = 8;

/** Unsigned box-sizer axis. */
export type Axis = typeof HORIZONTAL | typeof VERTICAL;

/**
 * Signed orientation accepted by `topFrame` and `panel`.
 * Negative values reverse placement (right to left, bottom to top).
 */
export type Orientation = Axis | -4 | -8;

// =============================================================================
// Sizer flag bits
// =============================================================================

export const LEFT = 0x0010;
export const RIGHT = 0x0020;
export const TOP = 0x0040;
export const BOTTOM = 0x0080;
export const ALL = LEFT | RIGHT | TOP | BOTTOM;

export const ALIGN_CENTER_HORIZONTAL = 0x0100;
export const ALIGN_CENTER_VERTICAL = 0x0800;
export const ALIGN_CENTER = ALIGN_CENTER_HORIZONTAL | ALIGN_CENTER_VERTICAL;
export const EXPAND = 0x2000;

/** Let the toolkit pick a widget id. */
export const ID_ANY = -1;

// =============================================================================
// LoomErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as LoomError instances.
 */
export type LoomErrorCode =
  | "LOOM_INVALID_PLAN"
  | "LOOM_INVALID_PROPS"
  | "LOOM_INVALID_STATE"
  | "LOOM_TOOLKIT_ERROR"
  | "LOOM_ACTOR_FAILED";

// =============================================================================
// LoomError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class LoomError extends Error {
  override readonly name = "LoomError";
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError);
    }
  }
}

export function isLoomError(value: unknown, code?: LoomErrorCode): value is LoomError {
  if (!(value instanceof LoomError)) return false;
  return code === undefined || value.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}

/**
 * Wrap a foreign throw from a toolkit call as LOOM_TOOLKIT_ERROR. LoomErrors
 * pass through unchanged.
 */
export function toolkitError(phase: string, err: unknown): LoomError {
  if (err instanceof LoomError) return err;
  return new LoomError("LOOM_TOOLKIT_ERROR", `${phase} threw: ${describeThrown(err)}`, {
    cause: err,
  });
}

export function toAxis(orientation: number, where: string): Axis {
  const axis = Math.abs(orientation);
  if (axis === HORIZONTAL) return HORIZONTAL;
  if (axis === VERTICAL) return VERTICAL;
  throw new LoomError(
    "LOOM_INVALID_PROPS",
    `${where}: orientation must be ±HORIZONTAL (4) or ±VERTICAL (8), got ${String(orientation)}`,
  );
}
