/**
 * Core Package - Field Declarations
 *
 * A class declares its fields in an own static `$fields` table:
 *
 * ```typescript
 * class BucketArgs {
 *   static $fields = {
 *     bucketName: field(T.optional(T.string), property("bucket_name")),
 *     acl: field(T.string, "private"),
 *   };
 *   declare bucketName: string | undefined;
 *   declare acl: string | undefined;
 * }
 * inputType(BucketArgs);
 * ```
 */

import type { TypeExpr } from "./types.js";

export const FIELDS_KEY = "$fields";

export interface FieldDeclaration {
  /** Declared type of the field */
  readonly type: TypeExpr;
  /** Plain default, or a Property carrying the wire name */
  readonly default?: unknown;
}

export type FieldTable = Readonly<Record<string, FieldDeclaration>>;

/**
 * Declare a field. `undefined` means no default; use `null` for an empty one.
 */
export function field(type: TypeExpr, defaultValue?: unknown): FieldDeclaration {
  return defaultValue === undefined ? { type } : { type, default: defaultValue };
}
