/**
 * Core Package - Type Expressions
 *
 * Declared field types are plain data, not runtime reflection. A TypeExpr is a
 * tagged structure that external validation code can walk; `T` builds them.
 *
 * Optional is not a node of its own: `T.optional(x)` is the union `{x, absent}`,
 * and unions are normalized on construction (nested unions flattened, duplicate
 * members dropped, single-member unions collapsed).
 */

/* =============================================================================
 * TYPE EXPRESSIONS
 * ============================================================================= */

export type PrimitiveName = "string" | "number" | "boolean" | "bigint" | "unknown";

/** Any constructor, including abstract ones. */
export type AnyConstructor = abstract new (...args: never[]) => object;

export interface PrimitiveType {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
}

/** The explicit absent alternative (`undefined` / `null`). */
export interface AbsentType {
  readonly kind: "absent";
}

/** A type backed by a runtime class. */
export interface ClassType {
  readonly kind: "class";
  readonly ctor: AnyConstructor;
}

/** A type with no runtime value, e.g. an interface. */
export interface NamedType {
  readonly kind: "named";
  readonly name: string;
}

export interface ListType {
  readonly kind: "list";
  readonly of: TypeExpr;
}

export interface MapType {
  readonly kind: "map";
  readonly of: TypeExpr;
}

/** Single-argument wrapper for a value produced asynchronously. */
export interface DeferredType {
  readonly kind: "deferred";
  readonly of: TypeExpr;
}

export interface UnionType {
  readonly kind: "union";
  readonly members: readonly TypeExpr[];
}

/** Forward reference, resolved lazily by `resolveType`. */
export interface RefType {
  readonly kind: "ref";
  readonly name: string;
  readonly resolve: () => TypeExpr;
}

export type TypeExpr =
  | PrimitiveType
  | AbsentType
  | ClassType
  | NamedType
  | ListType
  | MapType
  | DeferredType
  | UnionType
  | RefType;

export type TypeKind = TypeExpr["kind"];

/**
 * Type-level marker for a deferred value. Only the annotation matters; the
 * code generator maps `Deferred<X>` to `T.deferred(X)`.
 */
export type Deferred<T> = PromiseLike<T> | T;

/* =============================================================================
 * BUILDERS
 * ============================================================================= */

const primitive = (name: PrimitiveName): PrimitiveType => ({ kind: "primitive", name });

const ABSENT_TYPE: AbsentType = { kind: "absent" };

function union(...members: TypeExpr[]): TypeExpr {
  const flat: TypeExpr[] = [];
  const seen = new Set<string>();

  const add = (member: TypeExpr): void => {
    if (member.kind === "union") {
      member.members.forEach(add);
      return;
    }
    const key = typeKey(member);
    if (seen.has(key)) return;
    seen.add(key);
    flat.push(member);
  };
  members.forEach(add);

  const [first, ...rest] = flat;
  if (first && rest.length === 0) return first;
  return { kind: "union", members: flat };
}

export const T = {
  string: primitive("string"),
  number: primitive("number"),
  boolean: primitive("boolean"),
  bigint: primitive("bigint"),
  unknown: primitive("unknown"),
  absent: ABSENT_TYPE,

  cls: (ctor: AnyConstructor): ClassType => ({ kind: "class", ctor }),
  named: (name: string): NamedType => ({ kind: "named", name }),
  list: (of: TypeExpr): ListType => ({ kind: "list", of }),
  map: (of: TypeExpr): MapType => ({ kind: "map", of }),
  deferred: (of: TypeExpr): DeferredType => ({ kind: "deferred", of }),
  ref: (name: string, resolve: () => TypeExpr): RefType => ({ kind: "ref", name, resolve }),
  union,
  optional: (of: TypeExpr): TypeExpr => union(of, ABSENT_TYPE),
};

/* =============================================================================
 * INSPECTION
 * ============================================================================= */

const classIds = new WeakMap<AnyConstructor, number>();
let nextClassId = 0;

function classId(ctor: AnyConstructor): number {
  let id = classIds.get(ctor);
  if (id === undefined) {
    id = nextClassId++;
    classIds.set(ctor, id);
  }
  return id;
}

/**
 * Structural identity key. Two expressions with the same key are
 * interchangeable; refs compare by name only.
 */
export function typeKey(type: TypeExpr): string {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "absent":
      return "absent";
    case "class":
      return `class#${classId(type.ctor)}`;
    case "named":
      return `named:${type.name}`;
    case "list":
    case "map":
    case "deferred":
      return `${type.kind}<${typeKey(type.of)}>`;
    case "union":
      return `union<${type.members.map(typeKey).join("|")}>`;
    case "ref":
      return `ref:${type.name}`;
  }
}

export function typeEquals(a: TypeExpr, b: TypeExpr): boolean {
  return typeKey(a) === typeKey(b);
}

/**
 * Render a type the way it would be written in an annotation.
 */
export function formatType(type: TypeExpr): string {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "absent":
      return "undefined";
    case "class":
      return type.ctor.name || "<anonymous>";
    case "named":
    case "ref":
      return type.name;
    case "list":
      return `Array<${formatType(type.of)}>`;
    case "map":
      return `Record<string, ${formatType(type.of)}>`;
    case "deferred":
      return `Deferred<${formatType(type.of)}>`;
    case "union":
      return type.members.map(formatType).join(" | ");
  }
}

export function isTypeExpr(value: unknown): value is TypeExpr {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  switch (value.kind) {
    case "primitive":
    case "absent":
    case "class":
    case "named":
    case "list":
    case "map":
    case "deferred":
    case "union":
    case "ref":
      return true;
    default:
      return false;
  }
}
