/**
 * Transform Package - Transform Types
 *
 * Core types for the transformation pipeline.
 */

import type { TypedSourceEdit } from "../ts/types.js";

/* =============================================================================
 * TRANSFORM OPTIONS
 * ============================================================================= */

/**
 * Options for transforming a source file.
 */
export interface TransformOptions {
  /** Source code to transform */
  source: string;

  /** File path (for error messages) */
  filePath: string;

  /** Module the runtime API is imported from (default: "@wiremap/core") */
  runtimeModule?: string;

  /** Namespace the runtime module is imported under (default: "$wm") */
  namespace?: string;

  /** Decorator names marking input types (default: ["inputType"]) */
  inputDecorators?: readonly string[];

  /** Decorator names marking output types (default: ["outputType"]) */
  outputDecorators?: readonly string[];

  /** Function names creating property descriptors (default: ["property"]) */
  propertyFactories?: readonly string[];

  /** Generic type names meaning a deferred value (default: ["Deferred"]) */
  deferredNames?: readonly string[];

  /** Indentation string (default: "  ") */
  indent?: string;

  /** Whether to remove imports the transformation left unused (default: true) */
  removeImports?: boolean;
}

/* =============================================================================
 * TRANSFORM RESULT
 * ============================================================================= */

/**
 * Result of a transformation.
 */
export interface TransformResult {
  /** Transformed source code (the input, unchanged, when nothing matched) */
  code: string;

  /** Edits that were applied */
  edits: TypedSourceEdit[];

  /** Warnings from transformation */
  warnings: TransformWarning[];

  /** One entry per transformed class, in source order */
  classes: TransformedClass[];
}

/**
 * Warning from transformation.
 */
export interface TransformWarning {
  /** Warning code */
  code: TransformWarningCodeType;

  /** Human-readable message */
  message: string;

  /** File path */
  file?: string;

  /** Line number (1-based) */
  line?: number;

  /** Column number (0-based) */
  column?: number;
}

/** Warning codes */
export const TransformWarningCode = {
  /** An annotation could not be mapped and became `unknown` */
  UNKNOWN_TYPE: "TRANSFORM_UNKNOWN_TYPE",
  /** A field has no type annotation */
  MISSING_ANNOTATION: "TRANSFORM_MISSING_ANNOTATION",
  /** An output type keeps its own constructor, which must call initialize */
  OWN_CONSTRUCTOR: "TRANSFORM_OWN_CONSTRUCTOR",
  /** An output type inherits a constructor declared in another module */
  INHERITED_CONSTRUCTOR: "TRANSFORM_INHERITED_CONSTRUCTOR",
  /** Informational notes (e.g. removed imports) */
  INFO: "TRANSFORM_INFO",
} as const;

export type TransformWarningCodeType = (typeof TransformWarningCode)[keyof typeof TransformWarningCode];

/**
 * Metadata about one transformed class.
 */
export interface TransformedClass {
  /** Class name */
  className: string;

  /** Registered kind */
  kind: "input" | "output";

  /** Fields, in declaration order */
  fields: TransformedField[];

  /** Whether an initializer constructor was generated */
  constructorEmitted: boolean;
}

export interface TransformedField {
  /** Field name on the class */
  name: string;

  /** Key the value is stored under */
  wireName: string;

  /** Generated type expression code */
  typeCode: string;

  /** Whether a default (plain or descriptor-carried) was declared */
  hasDefault: boolean;
}

/* =============================================================================
 * TRANSFORM ERRORS
 * ============================================================================= */

/**
 * Error during transformation.
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly code: TransformErrorCodeType,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message);
    this.name = "TransformError";
  }
}

/** Error codes */
export const TransformErrorCode = {
  /** A decorated class has no name to register */
  NO_CLASS_NAME: "TRANSFORM_NO_CLASS_NAME",
  /** A class carries both an input and an output decorator, or one twice */
  CONFLICTING_KINDS: "TRANSFORM_CONFLICTING_KINDS",
  /** A field cannot be turned into an accessor */
  UNSUPPORTED_MEMBER: "TRANSFORM_UNSUPPORTED_MEMBER",
  /** Generated edits overlap */
  EDIT_CONFLICT: "TRANSFORM_EDIT_CONFLICT",
} as const;

export type TransformErrorCodeType = (typeof TransformErrorCode)[keyof typeof TransformErrorCode];
