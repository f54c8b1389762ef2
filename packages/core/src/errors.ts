/**
 * Error codes and the error class shared by the whole core.
 * @see DESIGN.md (error handling)
 */

/**
 * Deterministic error codes for contract violations.
 * These are surfaced as PxUiError instances.
 */
export type PxUiErrorCode =
  | "PXUI_INVALID_PROPS"
  | "PXUI_INVALID_STATE"
  | "PXUI_DUPLICATE_KEY"
  | "PXUI_STALE_WIDGET"
  | "PXUI_UNKNOWN_SPRITESHEET"
  | "PXUI_OUT_OF_BOUNDS";

/**
 * Error class for all deterministic contract violations.
 * The `code` property identifies the specific violation.
 */
export class PxUiError extends Error {
  override readonly name = "PxUiError";
  readonly code: PxUiErrorCode;

  constructor(code: PxUiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PxUiError);
    }
  }
}

/** Fatal outcome reported by internal passes before it is turned into a throw or a warning. */
export type PxUiFatal = Readonly<{
  code: PxUiErrorCode;
  detail: string;
}>;

export function invalidProps(detail: string): never {
  throw new PxUiError("PXUI_INVALID_PROPS", detail);
}

export function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

export function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}
