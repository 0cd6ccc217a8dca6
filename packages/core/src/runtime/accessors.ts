/**
 * Core Package - Accessor Synthesis
 *
 * Field accessors live on the class prototype and read/write the instance's
 * Value Store under the field's wire name. Accessors the class already defines
 * win over synthesized ones, except for empty placeholder bodies.
 */

import { assertWireName } from "../errors.js";
import type { Property } from "../model/property.js";
import type { TypeExpr } from "../model/types.js";
import { get, set } from "./access.js";
import { getterInfo, tagGetter, type ClassKind } from "./registry.js";

/* =============================================================================
 * EMPTY FUNCTION DETECTION
 * ============================================================================= */

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const LINE_COMMENT = /\/\/[^\n]*/g;

/**
 * True when the function body holds nothing but whitespace and comments,
 * e.g. `set name(value) {}`.
 */
export function isEmptyFunction(fn: Function): boolean {
  const source = Function.prototype.toString
    .call(fn)
    .replace(BLOCK_COMMENT, "")
    .replace(LINE_COMMENT, "")
    .trim();
  return /\{\s*\}$/.test(source);
}

/* =============================================================================
 * GETTER TAGGING
 * ============================================================================= */

type Getter<TValue> = (this: object) => TValue;
type Setter = (this: object, value: unknown) => void;

function named<F extends Function>(name: string, fn: F): F {
  Object.defineProperty(fn, "name", { value: name, configurable: true });
  return fn;
}

function inferWireName(fn: Function): string {
  return fn.name.replace(/^get /, "");
}

/**
 * Mark `fn` as a field getter reading `name` (default: the function's own
 * name). An empty-bodied `fn` is replaced by one that reads the Value Store.
 */
export function getter<TValue>(
  fn: Getter<TValue>,
  name?: string,
  returns?: TypeExpr
): Getter<TValue | undefined> {
  const wireName = name ?? inferWireName(fn);
  assertWireName(wireName);

  const result: Getter<TValue | undefined> = isEmptyFunction(fn)
    ? named(fn.name, function (this: object) {
        return get<TValue>(this, wireName);
      })
    : fn;

  tagGetter(result, returns === undefined ? { wireName } : { wireName, type: returns });
  return result;
}

/* =============================================================================
 * SYNTHESIS
 * ============================================================================= */

function storeWriter(fieldName: string, wireName: string): Setter {
  return named(fieldName, function (this: object, value: unknown) {
    set(this, wireName, value);
  });
}

/**
 * Define one accessor per declared field on `proto`.
 */
export function synthesizeAccessors(
  proto: object,
  kind: ClassKind,
  properties: ReadonlyMap<string, Property>
): void {
  for (const [fieldName, descriptor] of properties) {
    const { wireName, type } = descriptor;
    const existing = Object.getOwnPropertyDescriptor(proto, fieldName);

    const read = getter<unknown>(
      existing?.get ?? named(fieldName, function (this: object) {
        return get(this, wireName);
      }),
      wireName,
      type
    );

    let write: Setter | undefined;
    if (kind === "input") {
      const userSetter = existing?.set;
      write = userSetter && !isEmptyFunction(userSetter) ? userSetter : storeWriter(fieldName, wireName);
    }

    Object.defineProperty(proto, fieldName, {
      get: read,
      set: write,
      enumerable: false,
      configurable: true,
    });
  }
}

/**
 * Give every own accessor with a tagged getter and an empty setter a setter
 * that writes the Value Store. Non-empty setters are left as they are.
 */
export function replacePlaceholderSetters(proto: object): void {
  for (const key of Object.getOwnPropertyNames(proto)) {
    const existing = Object.getOwnPropertyDescriptor(proto, key);
    const info = getterInfo(existing?.get);
    if (!existing || !info || typeof existing.set !== "function" || !isEmptyFunction(existing.set)) {
      continue;
    }
    Object.defineProperty(proto, key, { ...existing, set: storeWriter(key, info.wireName) });
  }
}
