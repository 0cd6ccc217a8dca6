/**
 * Core Package - Property Descriptors
 *
 * A descriptor is the immutable record behind one declared field: the wire
 * name used in the Value Store, the declared default and the declared type.
 */

import { assertWireName } from "../errors.js";
import type { TypeExpr } from "./types.js";

/**
 * Sentinel for "no default given". Distinct from every legal value,
 * `null` and `undefined` included.
 */
export const ABSENT: unique symbol = Symbol("wiremap.absent");
export type Absent = typeof ABSENT;

export class Property {
  constructor(
    public readonly wireName: string,
    public readonly defaultValue: unknown = ABSENT,
    public readonly type: TypeExpr | undefined = undefined
  ) {
    assertWireName(wireName);
  }

  get hasDefault(): boolean {
    return this.defaultValue !== ABSENT;
  }

  /** Same descriptor with the declared type attached. */
  withType(type: TypeExpr): Property {
    return new Property(this.wireName, this.defaultValue, type);
  }
}

/**
 * Create a property descriptor.
 *
 * Used as a field's default to give it a wire name other than its field name:
 *
 * ```typescript
 * static $fields = {
 *   bucketName: field(T.string, property("bucket_name")),
 * };
 * ```
 */
export function property(wireName: string, defaultValue: unknown = ABSENT): Property {
  return new Property(wireName, defaultValue);
}

export function isProperty(value: unknown): value is Property {
  return value instanceof Property;
}
