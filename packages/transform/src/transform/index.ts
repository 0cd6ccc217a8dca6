/**
 * Transform Package - Transform
 */

export { transform, DEFAULT_RUNTIME_MODULE } from "./transform.js";
export { TransformError, TransformErrorCode, TransformWarningCode } from "./types.js";
export type {
  TransformOptions,
  TransformResult,
  TransformWarning,
  TransformWarningCodeType,
  TransformedClass,
  TransformedField,
  TransformErrorCodeType,
} from "./types.js";
