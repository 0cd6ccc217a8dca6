/**
 * Core Package - Class Registry
 *
 * Side tables keyed by identity: class → metadata, getter function → tag.
 * Both are written once at registration time and only read afterwards.
 */

import type { Property } from "../model/property.js";
import type { TypeExpr } from "../model/types.js";

/* =============================================================================
 * CLASS METADATA
 * ============================================================================= */

export type ClassKind = "input" | "output";

export interface ClassMetadata {
  readonly kind: ClassKind;
  /** fieldName → descriptor, in declaration order */
  readonly properties: ReadonlyMap<string, Property>;
}

/** Any class, abstract or not. */
export type AnyClass = abstract new (...args: never[]) => object;

const classes = new WeakMap<Function, ClassMetadata>();

export function registerClass(cls: AnyClass, metadata: ClassMetadata): void {
  classes.set(cls, metadata);
}

/** Metadata registered on `cls` itself, ignoring base classes. */
export function ownMetadataOf(cls: Function): ClassMetadata | undefined {
  return classes.get(cls);
}

/**
 * Metadata of `cls` or the nearest registered base class.
 */
export function metadataOf(cls: Function): ClassMetadata | undefined {
  for (let current: unknown = cls; typeof current === "function"; current = Object.getPrototypeOf(current)) {
    const metadata = classes.get(current);
    if (metadata) return metadata;
  }
  return undefined;
}

export function kindOf(cls: Function): ClassKind | undefined {
  return metadataOf(cls)?.kind;
}

export function isInputType(cls: Function): boolean {
  return kindOf(cls) === "input";
}

export function isOutputType(cls: Function): boolean {
  return kindOf(cls) === "output";
}

/** Kind of the class an instance was constructed from. */
export function instanceKind(instance: object): ClassKind | undefined {
  const proto: unknown = Object.getPrototypeOf(instance);
  if (typeof proto !== "object" || proto === null || !("constructor" in proto)) return undefined;
  return typeof proto.constructor === "function" ? kindOf(proto.constructor) : undefined;
}

/* =============================================================================
 * GETTER TAGS
 * ============================================================================= */

export interface GetterInfo {
  /** Wire name the getter reads */
  readonly wireName: string;
  /** Declared return type, when known */
  readonly type?: TypeExpr;
}

const getters = new WeakMap<Function, GetterInfo>();

export function tagGetter(fn: Function, info: GetterInfo): void {
  getters.set(fn, info);
}

export function getterInfo(fn: unknown): GetterInfo | undefined {
  return typeof fn === "function" ? getters.get(fn) : undefined;
}

export function isGetter(fn: unknown): boolean {
  return getterInfo(fn) !== undefined;
}
