/**
 * @wiremap/transform
 *
 * Rewrite classes decorated with `@inputType` / `@outputType` into the runtime
 * form `@wiremap/core` registers: a `$fields` table, Value Store accessors and
 * a registration call.
 *
 * @example
 * ```typescript
 * import { transform } from "@wiremap/transform";
 *
 * const result = transform({
 *   source: originalCode,
 *   filePath: "src/bucket.ts",
 * });
 *
 * console.log(result.code); // Source with $fields, accessors and $wm.inputType(...)
 * ```
 */

// Main transform function
export { transform, DEFAULT_RUNTIME_MODULE } from "./transform/index.js";
export type {
  TransformOptions,
  TransformResult,
  TransformWarning,
  TransformWarningCodeType,
  TransformedClass,
  TransformedField,
  TransformErrorCodeType,
} from "./transform/index.js";
export { TransformError, TransformErrorCode, TransformWarningCode } from "./transform/index.js";

// Emit utilities (for advanced use)
export {
  emitFieldTable,
  emitAccessors,
  emitConstructor,
  emitEqualsDeclaration,
  emitRegistration,
  escapeString,
  formatPropertyKey,
} from "./emit/index.js";
export type { EmitField, EmitKind, EmitOptions } from "./emit/index.js";

// TypeScript utilities (for advanced use)
export {
  parseSource,
  analyzeSource,
  findClasses,
  findClassByName,
  detectClassKind,
  collectScope,
  mapTypeNode,
  optionalTypeCode,
  findRemainingReferences,
  generateImportCleanupEdits,
  generateNamespaceImportEdit,
  hasNamespaceImport,
} from "./ts/index.js";
export type {
  ClassInfo,
  DecoratorInfo,
  FieldInfo,
  Heritage,
  ModuleScope,
  Span,
  TypedSourceEdit,
  SourceAnalysis,
  KindDecoratorNames,
  DetectedClassKind,
  TypeMapContext,
  ImportCleanupResult,
} from "./ts/index.js";

// Edit utilities (for advanced use)
export {
  applyEdits,
  applySingleEdit,
  replace,
  insert,
  del,
  deleteWithWhitespace,
  validateEdits,
} from "./ts/index.js";
