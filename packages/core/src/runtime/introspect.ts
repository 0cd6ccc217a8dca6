/**
 * Core Package - Type Introspection
 *
 * wireName → payload type, for validation code that checks values against
 * declared field types.
 */

import { WiremapError, WiremapErrorCode } from "../errors.js";
import { resolveType, unwrapType } from "../model/unwrap.js";
import { formatType, type TypeExpr } from "../model/types.js";
import { debug } from "../shared/debug.js";
import { getterInfo, isOutputType, ownMetadataOf } from "./registry.js";
import { scanDeclarations } from "./scan.js";

function payloadType(type: TypeExpr): TypeExpr {
  return unwrapType(resolveType(type));
}

/** Null prototype so a "__proto__" wire name stays an ordinary key. */
function emptyTypes(): Record<string, TypeExpr> {
  const types: Record<string, TypeExpr> = Object.create(null);
  return types;
}

/**
 * Payload types of an output type's getters, keyed by wire name.
 * Getters without a declared type are skipped.
 */
export function outputPropertyTypes(cls: Function): Record<string, TypeExpr> {
  if (!isOutputType(cls)) {
    throw new WiremapError(
      `outputPropertyTypes requires a class registered with outputType, got ${cls.name || "anonymous class"}`,
      WiremapErrorCode.PRECONDITION_FAILED
    );
  }

  const proto: unknown = Reflect.get(cls, "prototype");
  const result = emptyTypes();
  if (typeof proto !== "object" || proto === null) return result;

  for (const key of Object.getOwnPropertyNames(proto)) {
    const info = getterInfo(Object.getOwnPropertyDescriptor(proto, key)?.get);
    if (info?.type === undefined) continue;
    result[info.wireName] = payloadType(info.type);
  }

  debug.types("output", { className: cls.name, types: describe(result) });
  return result;
}

/**
 * Payload types of every field a class declares, keyed by wire name.
 * Works on registered and unregistered classes alike.
 */
export function resourcePropertyTypes(cls: Function): Record<string, TypeExpr> {
  const properties = ownMetadataOf(cls)?.properties ?? scanDeclarations(cls);
  const result = emptyTypes();

  for (const descriptor of properties.values()) {
    if (descriptor.type === undefined) continue;
    result[descriptor.wireName] = payloadType(descriptor.type);
  }

  debug.types("resource", { className: cls.name, types: describe(result) });
  return result;
}

function describe(types: Record<string, TypeExpr>): string[] {
  return Object.entries(types).map(([name, type]) => `${name}: ${formatType(type)}`);
}
