/**
 * Core Package - Class Registration
 *
 * `inputType` and `outputType` turn a class with a `$fields` table into a
 * typed property class. Call them once, right after the class is defined and
 * before any instance exists; registering the same class from two places is
 * not guarded against.
 *
 * ```typescript
 * class BucketArgs {
 *   static $fields = { bucketName: field(T.optional(T.string)) };
 *   declare bucketName: string | undefined;
 * }
 * inputType(BucketArgs);
 * ```
 */

import { WiremapError, WiremapErrorCode } from "../errors.js";
import { debug } from "../shared/debug.js";
import { isNativeMappingClass } from "./access.js";
import { replacePlaceholderSetters, synthesizeAccessors } from "./accessors.js";
import { synthesizeEquality } from "./equality.js";
import {
  kindOf,
  ownMetadataOf,
  registerClass,
  type AnyClass,
  type ClassKind,
} from "./registry.js";
import { scanDeclarations, stripFieldTable } from "./scan.js";

/**
 * Register `cls` as an input type: settable fields backed by a Value Store.
 * Returns `cls`.
 */
export function inputType<C extends AnyClass>(cls: C): C {
  return registerAs(cls, "input");
}

/**
 * Register `cls` as an output type: read-only fields, populated once through
 * `initialize`. Returns `cls`.
 */
export function outputType<C extends AnyClass>(cls: C): C {
  return registerAs(cls, "output");
}

function registerAs<C extends AnyClass>(cls: C, kind: ClassKind): C {
  assertRegistrable(cls, kind);

  const properties = scanDeclarations(cls);
  stripFieldTable(cls);
  registerClass(cls, { kind, properties });

  const proto = prototypeOf(cls);
  synthesizeAccessors(proto, kind, properties);
  if (kind === "input") {
    replacePlaceholderSetters(proto);
  }

  const nativeMapping = isNativeMappingClass(cls);
  if (!nativeMapping && !Object.hasOwn(proto, "equals")) {
    synthesizeEquality(proto);
  }

  debug.register(kind, {
    className: cls.name,
    wireNames: [...properties.values()].map((p) => p.wireName),
    nativeMapping,
  });

  return cls;
}

/**
 * A class carries one kind. Re-registering it fails, and so does registering
 * a subclass with the kind opposite to its base's.
 */
function assertRegistrable(cls: AnyClass, kind: ClassKind): void {
  const inherited = kindOf(cls);
  if (ownMetadataOf(cls) !== undefined || (inherited !== undefined && inherited !== kind)) {
    throw new WiremapError(
      `Cannot register ${cls.name || "class"} as ${kind} type: it is already registered as ${inherited} type`,
      WiremapErrorCode.ALREADY_DECORATED
    );
  }
}

function prototypeOf(cls: AnyClass): object {
  const proto: unknown = Reflect.get(cls, "prototype");
  if (typeof proto !== "object" || proto === null) {
    throw new WiremapError(`${cls.name} has no prototype to define fields on`, WiremapErrorCode.USAGE_ERROR);
  }
  return proto;
}
