/**
 * Transform Package - TypeScript AST Types
 *
 * Types for working with TypeScript source transformations.
 */

import type ts from "typescript";

/* =============================================================================
 * SOURCE LOCATION
 * ============================================================================= */

/**
 * A span in source code.
 */
export interface Span {
  /** Start offset in characters */
  start: number;

  /** End offset in characters (exclusive) */
  end: number;
}

/* =============================================================================
 * CLASS ANALYSIS
 * ============================================================================= */

/**
 * Information about a class declaration.
 */
export interface ClassInfo {
  /** Class name ("" for an anonymous default export) */
  name: string;

  /** Position of class declaration start (decorators included) */
  start: number;

  /** Position of class declaration end */
  end: number;

  /** Position of the opening brace */
  bodyStart: number;

  /** Position of the closing brace */
  bodyEnd: number;

  /** Leading whitespace of the line the class starts on */
  indent: string;

  /** Decorators applied to this class */
  decorators: DecoratorInfo[];

  /** Export modifiers */
  exportType: "none" | "named" | "default";

  /** What the class extends */
  heritage: Heritage;

  /** Whether the class declares its own constructor */
  hasConstructor: boolean;

  /** Whether the class declares an `equals` member */
  hasEquals: boolean;

  /** Instance fields, in declaration order */
  fields: FieldInfo[];
}

/**
 * Base class of a class declaration. `Map` is told apart because its
 * subclasses keep their own storage.
 */
export type Heritage =
  | { type: "none" }
  | { type: "map" }
  | { type: "class"; expression: string };

/**
 * Information about a decorator.
 */
export interface DecoratorInfo {
  /** Decorator name (e.g., "inputType"), without any namespace */
  name: string;

  /** Full decorator span including @ and arguments */
  span: Span;

  /** Whether this is a call expression (has parentheses) */
  isCall: boolean;

  /** Number of call arguments */
  argumentCount: number;
}

/**
 * An instance property declaration.
 */
export interface FieldInfo {
  /** Field name as written, without quotes */
  name: string;

  /** How the name is written */
  nameKind: "identifier" | "string" | "computed";

  /** Span of the whole declaration */
  span: Span;

  /** Leading whitespace of the declaration's line */
  indent: string;

  /** Declared with `?` */
  optional: boolean;

  /** Declared `readonly` */
  readonly: boolean;

  /** Type annotation, if any */
  typeNode: ts.TypeNode | undefined;

  /** Initializer expression, if any */
  initializer: ts.Expression | undefined;
}

/* =============================================================================
 * MODULE SCOPE
 * ============================================================================= */

/**
 * Top-level names of a module, by what they can stand for in a type
 * annotation.
 */
export interface ModuleScope {
  /** Classes declared in the module */
  classes: Set<string>;

  /** Interfaces declared in the module */
  interfaces: Set<string>;

  /** Enums declared in the module */
  enums: Set<string>;

  /** Type aliases declared in the module */
  aliases: Map<string, ts.TypeAliasDeclaration>;

  /** Names imported as values */
  valueImports: Set<string>;

  /** Names imported with `import type` or `type` specifiers */
  typeImports: Set<string>;

  /** `import * as ns` names */
  namespaceImports: Set<string>;
}

/* =============================================================================
 * TRANSFORMATION OPERATIONS
 * ============================================================================= */

/**
 * Edit with type discriminator.
 */
export interface TypedTextEdit {
  type: "replace";
  span: Span;
  newText: string;
}

export interface TypedInsertion {
  type: "insert";
  position: number;
  text: string;
}

export interface TypedDeletion {
  type: "delete";
  span: Span;
}

export type TypedSourceEdit = TypedTextEdit | TypedInsertion | TypedDeletion;
