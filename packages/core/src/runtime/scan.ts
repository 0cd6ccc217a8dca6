/**
 * Core Package - Declaration Scanner
 *
 * Reads the field declarations a class makes itself. A `$fields` table
 * inherited from a base class is not this class's declaration list.
 */

import { WiremapError, WiremapErrorCode } from "../errors.js";
import { FIELDS_KEY, type FieldDeclaration } from "../model/field.js";
import { ABSENT, Property, isProperty } from "../model/property.js";
import { isTypeExpr } from "../model/types.js";

/**
 * The class's own declaration table, as written.
 */
export function ownFieldTable(cls: Function): ReadonlyMap<string, FieldDeclaration> {
  const table = new Map<string, FieldDeclaration>();
  if (!Object.hasOwn(cls, FIELDS_KEY)) return table;

  const raw: unknown = Reflect.get(cls, FIELDS_KEY);
  if (typeof raw !== "object" || raw === null) {
    throw new WiremapError(
      `${cls.name}.${FIELDS_KEY} must be an object of field declarations`,
      WiremapErrorCode.INVALID_ARGUMENT
    );
  }

  for (const [name, declaration] of Object.entries(raw)) {
    if (name === "constructor") {
      throw new WiremapError(
        `${cls.name}.${FIELDS_KEY} cannot declare a field named constructor`,
        WiremapErrorCode.INVALID_ARGUMENT
      );
    }
    if (!isFieldDeclaration(declaration)) {
      throw new WiremapError(
        `${cls.name}.${FIELDS_KEY}.${name} is not a field declaration; use field(type, default?)`,
        WiremapErrorCode.INVALID_ARGUMENT
      );
    }
    table.set(name, declaration);
  }
  return table;
}

/**
 * fieldName → Property for every field the class declares itself.
 *
 * A descriptor given as the default is reused with the declared type attached.
 * Any other default is wrapped in a descriptor whose wire name is the field
 * name.
 */
export function scanDeclarations(cls: Function): Map<string, Property> {
  const properties = new Map<string, Property>();

  for (const [name, declaration] of ownFieldTable(cls)) {
    const defaultValue = "default" in declaration ? declaration.default : ABSENT;
    const descriptor = isProperty(defaultValue)
      ? defaultValue.withType(declaration.type)
      : new Property(name, defaultValue, declaration.type);
    properties.set(name, descriptor);
  }

  return properties;
}

/** Remove the class's own declaration table. */
export function stripFieldTable(cls: Function): void {
  Reflect.deleteProperty(cls, FIELDS_KEY);
}

function isFieldDeclaration(value: unknown): value is FieldDeclaration {
  return typeof value === "object" && value !== null && "type" in value && isTypeExpr(value.type);
}
