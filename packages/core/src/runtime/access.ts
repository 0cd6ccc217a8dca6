/**
 * Core Package - Value Store & Access Protocol
 *
 * Each instance owns one Value Store (wireName → value). Field accessors never
 * hold state of their own; they go through `get` and `set` below.
 */

import { WiremapError, WiremapErrorCode, assertWireName } from "../errors.js";
import { instanceKind } from "./registry.js";

export type ValueStore = Record<string, unknown>;

const stores = new WeakMap<object, ValueStore>();

/**
 * Instance method an output class may define to map a wire name to the key it
 * is stored under.
 *
 * ```typescript
 * class Payload extends Map<string, unknown> {
 *   [translateProperty](name: string): string {
 *     return snakeCase(name);
 *   }
 * }
 * ```
 */
export const translateProperty: unique symbol = Symbol("wiremap.translateProperty");

export interface TranslatesProperties {
  [translateProperty](name: string): string;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/** True for `Map` and its subclasses. */
export function isNativeMappingClass(cls: Function): boolean {
  for (let current: unknown = cls; typeof current === "function"; current = Object.getPrototypeOf(current)) {
    if (current === Map) return true;
  }
  return false;
}

export function isPlainMapping(value: unknown): value is ValueStore {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function translates(instance: object): instance is TranslatesProperties {
  return translateProperty in instance && typeof instance[translateProperty] === "function";
}

function lookup(store: ValueStore | undefined, key: string): unknown {
  return store !== undefined && Object.hasOwn(store, key) ? store[key] : undefined;
}

/** The instance's Value Store, if one exists yet. */
export function storeOf(instance: object): ValueStore | undefined {
  return stores.get(instance);
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Read a field value by wire name. An unset field reads as `undefined`.
 */
export function get<TValue = unknown>(instance: object, wireName: string): TValue | undefined;
export function get(instance: object, wireName: string): unknown {
  assertWireName(wireName);

  switch (instanceKind(instance)) {
    case "input":
      return lookup(stores.get(instance), wireName);

    case "output": {
      const key = translates(instance) ? instance[translateProperty](wireName) : wireName;
      // Map.prototype.get directly, in case the subclass shadows `get`
      if (instance instanceof Map) {
        return Map.prototype.get.call(instance, key);
      }
      return lookup(stores.get(instance), key);
    }

    case undefined:
      throw new WiremapError(
        "get can only be used with classes registered with inputType or outputType",
        WiremapErrorCode.USAGE_ERROR
      );
  }
}

/**
 * Write a field value by wire name. Input types only.
 */
export function set(instance: object, wireName: string, value: unknown): void {
  assertWireName(wireName);

  if (instanceKind(instance) !== "input") {
    throw new WiremapError(
      "set can only be used with classes registered with inputType",
      WiremapErrorCode.USAGE_ERROR
    );
  }

  let store = stores.get(instance);
  if (store === undefined) {
    // Null prototype so wire names like "__proto__" stay ordinary keys
    const created: ValueStore = Object.create(null);
    store = created;
    stores.set(instance, store);
  }
  store[wireName] = value;
}

/**
 * Output-type initializer: keep `values` as the instance's Value Store.
 * The object is stored as given, not copied.
 */
export function initialize(instance: object, values: unknown): void {
  if (instanceKind(instance) !== "output") {
    throw new WiremapError(
      "initialize can only be used with classes registered with outputType",
      WiremapErrorCode.USAGE_ERROR
    );
  }
  if (!isPlainMapping(values)) {
    throw new WiremapError("Expected value to be a plain object", WiremapErrorCode.TYPE_MISMATCH);
  }
  stores.set(instance, values);
}

/**
 * Copy of an input-type instance's values, keyed by wire name.
 */
export function toPlainMapping(instance: object): Record<string, unknown> {
  if (instanceKind(instance) !== "input") {
    throw new WiremapError(
      "toPlainMapping can only be used with instances of classes registered with inputType",
      WiremapErrorCode.USAGE_ERROR
    );
  }
  return { ...stores.get(instance) };
}
