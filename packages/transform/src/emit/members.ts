/**
 * Transform Package - Class Member Emission
 *
 * Generates the runtime form of a decorated class: the `$fields` table,
 * accessors backed by the Value Store, the output initializer constructor and
 * the registration call.
 */

import { formatPropertyKey, quote } from "./format.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

export type EmitKind = "input" | "output";

/**
 * One field, ready for emission.
 */
export interface EmitField {
  /** Field name on the class */
  name: string;

  /** Key the value is stored under */
  wireName: string;

  /** Code building the declared type expression */
  typeCode: string;

  /** TypeScript type of the field's value, for accessor signatures */
  typeText: string;

  /** Code for the second `field()` argument, if any */
  defaultCode?: string;
}

export interface EmitOptions {
  /** Namespace the runtime module is imported under */
  ns: string;

  /** One level of indentation */
  indent: string;
}

/* =============================================================================
 * EMITTERS
 * ============================================================================= */

/**
 * `static $fields` table. Lines are indented with `memberIndent`.
 */
export function emitFieldTable(fields: readonly EmitField[], memberIndent: string, options: EmitOptions): string {
  const { ns, indent } = options;
  const entries = fields.map(field => {
    const args = field.defaultCode === undefined ? field.typeCode : `${field.typeCode}, ${field.defaultCode}`;
    return `${memberIndent}${indent}${formatPropertyKey(field.name)}: ${ns}.field(${args}),`;
  });

  return [
    `${memberIndent}static $fields: ${ns}.FieldTable = {`,
    ...entries,
    `${memberIndent}};`,
  ].join("\n");
}

/**
 * Getter (and setter, for input types) replacing a field declaration. The
 * first line carries no indentation: it takes the declaration's place.
 */
export function emitAccessors(
  field: EmitField,
  kind: EmitKind,
  memberIndent: string,
  options: EmitOptions
): string {
  const { ns, indent } = options;
  const key = formatPropertyKey(field.name);
  const wire = quote(field.wireName);
  const valueType = accessorType(field.typeText);

  const lines = [
    `get ${key}(): ${valueType} {`,
    `${memberIndent}${indent}return ${ns}.get<${field.typeText}>(this, ${wire});`,
    `${memberIndent}}`,
  ];

  if (kind === "input") {
    lines.push(
      `${memberIndent}set ${key}(value: ${valueType}) {`,
      `${memberIndent}${indent}${ns}.set(this, ${wire}, value);`,
      `${memberIndent}}`
    );
  }

  return lines.join("\n");
}

/**
 * Output-type constructor keeping the payload as the Value Store. Subclasses
 * of a plain class call `super()` first.
 */
export function emitConstructor(memberIndent: string, options: EmitOptions, callsSuper = false): string {
  const body = `${memberIndent}${options.indent}`;
  return [
    `${memberIndent}constructor(values: unknown) {`,
    ...(callsSuper ? [`${body}super();`] : []),
    `${body}${options.ns}.initialize(this, values);`,
    `${memberIndent}}`,
  ].join("\n");
}

/**
 * Type-only declaration of the synthesized `equals`.
 */
export function emitEqualsDeclaration(memberIndent: string): string {
  return `${memberIndent}declare equals: (other: unknown) => boolean;`;
}

/**
 * Registration statement placed after the class.
 */
export function emitRegistration(className: string, kind: EmitKind, classIndent: string, options: EmitOptions): string {
  return `${classIndent}${options.ns}.${kind}Type(${className});`;
}

function accessorType(typeText: string): string {
  if (typeText === "unknown" || /\|\s*undefined$/.test(typeText)) return typeText;
  return `${typeText} | undefined`;
}
