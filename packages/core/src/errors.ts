/**
 * Core Package - Errors
 *
 * Every failure here is a programming-time contract violation. Nothing is
 * caught or retried inside the package.
 */

/** Error codes */
export const WiremapErrorCode = {
  /** Wire name missing, empty or not a string */
  INVALID_ARGUMENT: "WIREMAP_INVALID_ARGUMENT",
  /** Class registered as input or output type twice */
  ALREADY_DECORATED: "WIREMAP_ALREADY_DECORATED",
  /** Operation used against the wrong class kind, or an unregistered class */
  USAGE_ERROR: "WIREMAP_USAGE_ERROR",
  /** Output initializer given something other than a plain object */
  TYPE_MISMATCH: "WIREMAP_TYPE_MISMATCH",
  /** Introspection on a class lacking the required kind */
  PRECONDITION_FAILED: "WIREMAP_PRECONDITION_FAILED",
  /** Forward reference whose resolver threw */
  UNRESOLVED_REFERENCE: "WIREMAP_UNRESOLVED_REFERENCE",
} as const;

export type WiremapErrorCodeType = (typeof WiremapErrorCode)[keyof typeof WiremapErrorCode];

export class WiremapError extends Error {
  constructor(
    message: string,
    public readonly code: WiremapErrorCodeType,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "WiremapError";
  }
}

export function isWiremapError(value: unknown, code?: WiremapErrorCodeType): value is WiremapError {
  return value instanceof WiremapError && (code === undefined || value.code === code);
}

/** Shared wire-name check for `property`, `get` and `set`. */
export function assertWireName(name: unknown): asserts name is string {
  if (typeof name !== "string") {
    throw new WiremapError("Expected name to be a string", WiremapErrorCode.INVALID_ARGUMENT);
  }
  if (name.length === 0) {
    throw new WiremapError("Missing name argument", WiremapErrorCode.INVALID_ARGUMENT);
  }
}
