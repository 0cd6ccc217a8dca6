/**
 * Core Package - Type Unwrapping
 *
 * Reduces a declared field type to its payload type: at most one deferred
 * layer around at most one optional layer. Used by introspection, never by
 * value access.
 */

import { WiremapError, WiremapErrorCode } from "../errors.js";
import { debug } from "../shared/debug.js";
import { T, formatType, type RefType, type TypeExpr } from "./types.js";

/**
 * True for the absent type and for unions with an optional member.
 */
export function isOptionalType(type: TypeExpr): boolean {
  if (type.kind === "absent") return true;
  if (type.kind === "union") return type.members.some(isOptionalType);
  return false;
}

/**
 * Unwrap `T` from `T | undefined`.
 *
 * Only the two-member form is unwrapped. `T.optional(T.union(a, b))` flattens
 * to `a | b | undefined` and comes back unchanged.
 */
export function unwrapOptional(type: TypeExpr): TypeExpr {
  if (!isOptionalType(type) || type.kind !== "union" || type.members.length !== 2) {
    return type;
  }
  const [first, second] = type.members;
  if (second?.kind === "absent" && first) return first;
  if (first?.kind === "absent" && second) return second;
  return type;
}

/**
 * Unwrap `T` from `Deferred<T>`, then from `T | undefined`.
 * Each step runs once.
 */
export function unwrapType(type: TypeExpr): TypeExpr {
  const payload = type.kind === "deferred" ? type.of : type;
  return unwrapOptional(payload);
}

/**
 * Replace forward references with what they resolve to. A reference met again
 * while it is being resolved stays a `ref` node.
 */
export function resolveType(type: TypeExpr): TypeExpr {
  return resolveWith(type, new Set());
}

function resolveWith(type: TypeExpr, active: Set<RefType>): TypeExpr {
  switch (type.kind) {
    case "ref": {
      if (active.has(type)) return type;
      active.add(type);
      try {
        return resolveWith(callResolver(type), active);
      } finally {
        active.delete(type);
      }
    }
    case "list":
      return T.list(resolveWith(type.of, active));
    case "map":
      return T.map(resolveWith(type.of, active));
    case "deferred":
      return T.deferred(resolveWith(type.of, active));
    case "union":
      return T.union(...type.members.map((member) => resolveWith(member, active)));
    default:
      return type;
  }
}

function callResolver(ref: RefType): TypeExpr {
  let resolved: TypeExpr;
  try {
    resolved = ref.resolve();
  } catch (cause) {
    throw new WiremapError(
      `Cannot resolve forward reference "${ref.name}"`,
      WiremapErrorCode.UNRESOLVED_REFERENCE,
      { cause }
    );
  }
  debug.types("ref.resolved", { name: ref.name, type: formatType(resolved) });
  return resolved;
}
