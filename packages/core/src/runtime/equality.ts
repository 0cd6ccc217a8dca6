/**
 * Core Package - Structural Equality
 *
 * Two registered instances are equal when they come from the exact same class
 * and their Value Stores hold equal mappings.
 */

import { storeOf } from "./access.js";

export interface Equatable {
  equals(other: unknown): boolean;
}

function hasEquals(value: unknown): value is Equatable {
  return typeof value === "object" && value !== null && "equals" in value && typeof value.equals === "function";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) return mappingsEqual(a, b);
  if (a instanceof Date && b instanceof Date) return Object.is(a.getTime(), b.getTime());
  if (a instanceof Map && b instanceof Map) return mapsEqual(a, b);
  if (hasEquals(a)) return a.equals(b);
  return false;
}

function mapsEqual(a: ReadonlyMap<unknown, unknown>, b: ReadonlyMap<unknown, unknown>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || !valuesEqual(value, b.get(key))) return false;
  }
  return true;
}

/**
 * Same keys, and equal values under each key.
 */
export function mappingsEqual(
  a: Readonly<Record<string, unknown>> | undefined,
  b: Readonly<Record<string, unknown>> | undefined
): boolean {
  if (a === undefined || b === undefined) return a === b;
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
}

function sameClass(a: object, b: object): boolean {
  return Object.getPrototypeOf(a) === Object.getPrototypeOf(b);
}

/**
 * Compare two values, through their `equals` method when they have one.
 */
export function equals(a: unknown, b: unknown): boolean {
  if (hasEquals(a)) return a.equals(b);
  return Object.is(a, b);
}

/**
 * Add a structural `equals` method to `proto`.
 */
export function synthesizeEquality(proto: object): void {
  Object.defineProperty(proto, "equals", {
    value: function equals(this: object, other: unknown): boolean {
      return (
        typeof other === "object" &&
        other !== null &&
        sameClass(this, other) &&
        mappingsEqual(storeOf(this), storeOf(other))
      );
    },
    writable: true,
    enumerable: false,
    configurable: true,
  });
}
