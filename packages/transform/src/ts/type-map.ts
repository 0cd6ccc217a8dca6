/**
 * Transform Package - Type Annotation Mapping
 *
 * Turns a field's TypeScript annotation into source code that builds the
 * matching runtime type expression with `T`:
 *
 * ```
 * string | undefined        → $wm.T.optional($wm.T.string)
 * Deferred<string[]>        → $wm.T.deferred($wm.T.list($wm.T.string))
 * Record<string, Website>   → $wm.T.map($wm.T.ref("Website", () => $wm.T.cls(Website)))
 * ```
 *
 * Only syntax is consulted: no type checker, no other files. Names the module
 * cannot account for map to `unknown` with a warning.
 */

import ts from "typescript";
import { escapeString } from "../emit/format.js";
import type { ModuleScope } from "./types.js";

export interface TypeMapContext {
  sourceFile: ts.SourceFile;
  scope: ModuleScope;
  /** Namespace the runtime module is imported under */
  ns: string;
  /** Generic type names that mean "deferred" */
  deferredNames: readonly string[];
  /** Called for annotations that fall back to `unknown` */
  warn(node: ts.Node, message: string): void;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Type expression code for an annotation. A missing annotation is `unknown`.
 */
export function mapTypeNode(node: ts.TypeNode | undefined, ctx: TypeMapContext): string {
  if (!node) return builtin(ctx, "unknown");
  return new TypeMapper(ctx).map(node);
}

/**
 * Make a type expression optional, unless it already is.
 */
export function optionalTypeCode(code: string, ns: string): string {
  if (code === `${ns}.T.absent` || code.startsWith(`${ns}.T.optional(`)) return code;
  return `${ns}.T.optional(${code})`;
}

/* =============================================================================
 * MAPPER
 * ============================================================================= */

function builtin(ctx: TypeMapContext, name: string): string {
  return `${ctx.ns}.T.${name}`;
}

class TypeMapper {
  /** Aliases being expanded, to stop on self-reference */
  private readonly expanding = new Set<string>();

  constructor(private readonly ctx: TypeMapContext) {}

  map(node: ts.TypeNode): string {
    switch (node.kind) {
      case ts.SyntaxKind.StringKeyword:
        return this.t("string");
      case ts.SyntaxKind.NumberKeyword:
        return this.t("number");
      case ts.SyntaxKind.BooleanKeyword:
        return this.t("boolean");
      case ts.SyntaxKind.BigIntKeyword:
        return this.t("bigint");
      case ts.SyntaxKind.AnyKeyword:
      case ts.SyntaxKind.UnknownKeyword:
      case ts.SyntaxKind.ObjectKeyword:
        return this.t("unknown");
      case ts.SyntaxKind.UndefinedKeyword:
      case ts.SyntaxKind.VoidKeyword:
        return this.t("absent");
    }

    if (ts.isParenthesizedTypeNode(node)) return this.map(node.type);
    if (ts.isLiteralTypeNode(node)) return this.literal(node);
    if (ts.isTemplateLiteralTypeNode(node)) return this.t("string");
    if (ts.isUnionTypeNode(node)) return this.union(node.types);
    if (ts.isArrayTypeNode(node)) return this.call("list", this.map(node.elementType));
    if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
      return this.map(node.type);
    }
    if (ts.isTypeLiteralNode(node)) return this.typeLiteral(node);
    if (ts.isTypeReferenceNode(node)) return this.reference(node);

    return this.unknown(node, `Unsupported type annotation "${this.text(node)}"; using unknown`);
  }

  /* ---------------------------------------------------------------------------
   * Literals and unions
   * ------------------------------------------------------------------------- */

  private literal(node: ts.LiteralTypeNode): string {
    const literal = node.literal;
    switch (literal.kind) {
      case ts.SyntaxKind.NullKeyword:
        return this.t("absent");
      case ts.SyntaxKind.TrueKeyword:
      case ts.SyntaxKind.FalseKeyword:
        return this.t("boolean");
      case ts.SyntaxKind.StringLiteral:
      case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
        return this.t("string");
      case ts.SyntaxKind.NumericLiteral:
        return this.t("number");
      case ts.SyntaxKind.BigIntLiteral:
        return this.t("bigint");
      case ts.SyntaxKind.PrefixUnaryExpression:
        return ts.isPrefixUnaryExpression(literal) && ts.isBigIntLiteral(literal.operand)
          ? this.t("bigint")
          : this.t("number");
      default:
        return this.unknown(node, `Unsupported literal type "${this.text(node)}"; using unknown`);
    }
  }

  /**
   * Unions keep their members; an absent member turns the rest optional.
   * Members that map to the same code appear once.
   */
  private union(types: readonly ts.TypeNode[]): string {
    const absent = this.t("absent");
    const members: string[] = [];
    let optional = false;

    for (const type of types) {
      const code = this.map(type);
      if (code === absent) {
        optional = true;
      } else if (!members.includes(code)) {
        members.push(code);
      }
    }

    const [only] = members;
    if (only === undefined) return absent;
    const core = members.length === 1 ? only : this.call("union", ...members);
    return optional ? this.call("optional", core) : core;
  }

  /* ---------------------------------------------------------------------------
   * Object types
   * ------------------------------------------------------------------------- */

  /**
   * `{ [key: string]: X }` is a map; any other object literal type is not
   * representable.
   */
  private typeLiteral(node: ts.TypeLiteralNode): string {
    const [member] = node.members;
    if (node.members.length === 1 && member && ts.isIndexSignatureDeclaration(member)) {
      const [parameter] = member.parameters;
      if (parameter?.type?.kind === ts.SyntaxKind.StringKeyword) {
        return this.call("map", this.map(member.type));
      }
    }
    return this.unknown(node, `Unsupported object type "${this.text(node)}"; using unknown`);
  }

  private reference(node: ts.TypeReferenceNode): string {
    const args = node.typeArguments ?? [];
    const typeName = node.typeName;

    if (ts.isQualifiedName(typeName)) {
      return this.qualified(node, typeName);
    }

    const name = typeName.text;
    const [first, second] = args;

    if ((name === "Array" || name === "ReadonlyArray") && first && args.length === 1) {
      return this.call("list", this.map(first));
    }

    if (name === "Record" && first && second && args.length === 2) {
      if (first.kind === ts.SyntaxKind.StringKeyword) {
        return this.call("map", this.map(second));
      }
      return this.unknown(node, `Record keys must be string in "${this.text(node)}"; using unknown`);
    }

    if (this.ctx.deferredNames.includes(name) && first && args.length === 1) {
      return this.call("deferred", this.map(first));
    }

    return this.named(node, name);
  }

  /**
   * A bare or generic name: follow same-module aliases, reference classes,
   * name interfaces and types that only exist at compile time.
   */
  private named(node: ts.TypeReferenceNode, name: string): string {
    const { scope } = this.ctx;

    const alias = scope.aliases.get(name);
    if (alias) {
      if (alias.typeParameters || this.expanding.has(name)) {
        return this.call("named", this.quote(name));
      }
      this.expanding.add(name);
      try {
        return this.map(alias.type);
      } finally {
        this.expanding.delete(name);
      }
    }

    if (scope.classes.has(name) || scope.valueImports.has(name)) {
      return this.classRef(name);
    }

    if (scope.interfaces.has(name) || scope.enums.has(name) || scope.typeImports.has(name)) {
      return this.call("named", this.quote(name));
    }

    return this.unknown(node, `Cannot resolve type "${name}"; using unknown`);
  }

  private qualified(node: ts.TypeReferenceNode, typeName: ts.QualifiedName): string {
    const text = this.text(typeName);
    let root: ts.EntityName = typeName;
    while (ts.isQualifiedName(root)) root = root.left;

    if (this.ctx.scope.namespaceImports.has(root.text)) {
      return this.classRef(text);
    }
    if (this.ctx.scope.typeImports.has(root.text)) {
      return this.call("named", this.quote(text));
    }
    return this.unknown(node, `Cannot resolve type "${text}"; using unknown`);
  }

  /* ---------------------------------------------------------------------------
   * Code building
   * ------------------------------------------------------------------------- */

  /** Classes go through a reference so later declarations resolve. */
  private classRef(expression: string): string {
    return this.call("ref", this.quote(expression), `() => ${this.call("cls", expression)}`);
  }

  private t(name: string): string {
    return builtin(this.ctx, name);
  }

  private call(name: string, ...args: string[]): string {
    return `${this.t(name)}(${args.join(", ")})`;
  }

  private quote(text: string): string {
    return `"${escapeString(text)}"`;
  }

  private text(node: ts.Node): string {
    return node.getText(this.ctx.sourceFile);
  }

  private unknown(node: ts.Node, message: string): string {
    this.ctx.warn(node, message);
    return this.t("unknown");
  }
}
