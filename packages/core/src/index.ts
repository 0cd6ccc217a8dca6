/**
 * @wiremap/core
 *
 * Typed property classes: fields with wire names, backed by one Value Store
 * per instance, plus the type algebra used to describe them.
 *
 * @example
 * ```typescript
 * import { field, get, inputType, property, set, T, toPlainMapping } from "@wiremap/core";
 *
 * class BucketArgs {
 *   static $fields = {
 *     bucketName: field(T.optional(T.string), property("bucket_name")),
 *   };
 *   declare bucketName: string | undefined;
 * }
 * inputType(BucketArgs);
 *
 * const args = new BucketArgs();
 * args.bucketName = "logs";
 * toPlainMapping(args); // { bucket_name: "logs" }
 * ```
 */

// Type algebra
export {
  T,
  typeKey,
  typeEquals,
  formatType,
  isTypeExpr,
} from "./model/types.js";
export type {
  TypeExpr,
  TypeKind,
  PrimitiveName,
  PrimitiveType,
  AbsentType,
  ClassType,
  NamedType,
  ListType,
  MapType,
  DeferredType,
  UnionType,
  RefType,
  AnyConstructor,
  Deferred,
} from "./model/types.js";
export { unwrapOptional, unwrapType, isOptionalType, resolveType } from "./model/unwrap.js";

// Declarations
export { ABSENT, Property, property, isProperty } from "./model/property.js";
export type { Absent } from "./model/property.js";
export { FIELDS_KEY, field } from "./model/field.js";
export type { FieldDeclaration, FieldTable } from "./model/field.js";
export { scanDeclarations, ownFieldTable } from "./runtime/scan.js";

// Registration and kind queries
export { inputType, outputType } from "./runtime/register.js";
export { isInputType, isOutputType, kindOf, metadataOf, isGetter, getterInfo } from "./runtime/registry.js";
export type { ClassKind, ClassMetadata, GetterInfo, AnyClass } from "./runtime/registry.js";
export { getter, isEmptyFunction } from "./runtime/accessors.js";

// Value access
export {
  get,
  set,
  initialize,
  toPlainMapping,
  translateProperty,
  isPlainMapping,
  isNativeMappingClass,
} from "./runtime/access.js";
export type { ValueStore, TranslatesProperties } from "./runtime/access.js";
export { equals, mappingsEqual } from "./runtime/equality.js";
export type { Equatable } from "./runtime/equality.js";

// Introspection
export { outputPropertyTypes, resourcePropertyTypes } from "./runtime/introspect.js";

// Errors
export { WiremapError, WiremapErrorCode, isWiremapError } from "./errors.js";
export type { WiremapErrorCodeType } from "./errors.js";

// Debug channels
export {
  debug,
  getDebugChannel,
  refreshDebugChannels,
  configureDebug,
  isDebugEnabled,
} from "./shared/debug.js";
export type { DebugChannel, DebugConfig, DebugData, Debug } from "./shared/debug.js";
