/**
 * Transform Package - TypeScript Source Analysis
 *
 * Analyzes TypeScript source to find classes, their decorators and fields, and
 * the module-level names a type annotation can refer to.
 * Uses the TypeScript compiler API.
 */

import ts from "typescript";
import type {
  ClassInfo,
  DecoratorInfo,
  FieldInfo,
  Heritage,
  ModuleScope,
  Span,
} from "./types.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Parse source code into a TypeScript AST.
 */
export function parseSource(source: string, fileName = "source.ts"): ts.SourceFile {
  return ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.Latest,
    /* setParentNodes */ true,
    ts.ScriptKind.TS
  );
}

export interface SourceAnalysis {
  sourceFile: ts.SourceFile;
  /** Every class declaration, anonymous ones included */
  classes: ClassInfo[];
  scope: ModuleScope;
}

/**
 * Parse and analyze a module in one pass.
 */
export function analyzeSource(source: string, fileName = "source.ts"): SourceAnalysis {
  const sourceFile = parseSource(source, fileName);
  const classes: ClassInfo[] = [];

  function visit(node: ts.Node): void {
    if (ts.isClassDeclaration(node)) {
      classes.push(extractClassInfo(node, sourceFile));
    }
    ts.forEachChild(node, visit);
  }

  ts.forEachChild(sourceFile, visit);
  return { sourceFile, classes, scope: collectScope(sourceFile) };
}

/**
 * Find all named class declarations in source code.
 */
export function findClasses(source: string): ClassInfo[] {
  return analyzeSource(source).classes.filter(c => c.name !== "");
}

/**
 * Find a class by name.
 */
export function findClassByName(source: string, className: string): ClassInfo | null {
  const classes = findClasses(source);
  return classes.find(c => c.name === className) ?? null;
}

/**
 * Decorator names that mark a class as an input or output type.
 */
export interface KindDecoratorNames {
  input: readonly string[];
  output: readonly string[];
}

export type DetectedClassKind =
  | { kind: "input" | "output"; decorator: DecoratorInfo }
  | { kind: "conflict"; decorators: DecoratorInfo[] }
  | { kind: "none" };

/**
 * Detect which kind decorator a class carries.
 */
export function detectClassKind(classInfo: ClassInfo, names: KindDecoratorNames): DetectedClassKind {
  const input = classInfo.decorators.filter(d => names.input.includes(d.name));
  const output = classInfo.decorators.filter(d => names.output.includes(d.name));
  const all = [...input, ...output];

  if (all.length > 1) {
    return { kind: "conflict", decorators: all };
  }
  const [inputDecorator] = input;
  if (inputDecorator) return { kind: "input", decorator: inputDecorator };
  const [outputDecorator] = output;
  if (outputDecorator) return { kind: "output", decorator: outputDecorator };
  return { kind: "none" };
}

/* =============================================================================
 * CLASS INFO EXTRACTION
 * ============================================================================= */

function extractClassInfo(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): ClassInfo {
  const name = node.name?.text ?? "";

  // Get decorators (may extend before keyword)
  const decorators = extractDecorators(node, sourceFile);

  // Calculate class start - include decorators if present
  const decoratorStart = decorators.length > 0
    ? Math.min(...decorators.map(d => d.span.start))
    : null;
  const nodeStart = node.getStart(sourceFile);
  const start = decoratorStart !== null ? Math.min(decoratorStart, nodeStart) : nodeStart;

  // Class end
  const end = node.getEnd();

  // Find the opening brace of the class body
  const bodyStart = findOpenBrace(node, sourceFile);
  const bodyEnd = end - 1; // Before closing brace

  return {
    name,
    start,
    end,
    bodyStart,
    bodyEnd,
    indent: lineIndent(sourceFile.text, start),
    decorators,
    exportType: getExportType(node),
    heritage: getHeritage(node, sourceFile),
    hasConstructor: node.members.some(ts.isConstructorDeclaration),
    hasEquals: node.members.some(m => memberName(m) === "equals"),
    fields: extractFields(node, sourceFile),
  };
}

/* =============================================================================
 * DECORATOR EXTRACTION
 * ============================================================================= */

function decoratorsOf(node: ts.Node): readonly ts.Decorator[] {
  if (ts.canHaveDecorators(node)) {
    return ts.getDecorators(node) ?? [];
  }
  return [];
}

/**
 * Extract decorators with span information.
 */
function extractDecorators(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): DecoratorInfo[] {
  const decorators: DecoratorInfo[] = [];

  for (const dec of decoratorsOf(node)) {
    const info = extractDecoratorInfo(dec, sourceFile);
    if (info) {
      decorators.push(info);
    }
  }

  return decorators;
}

/**
 * Extract information from a single decorator.
 */
function extractDecoratorInfo(dec: ts.Decorator, sourceFile: ts.SourceFile): DecoratorInfo | null {
  const expr = dec.expression;
  const span: Span = { start: dec.getStart(sourceFile), end: dec.getEnd() };

  // @decorator or @ns.decorator (no call)
  const bareName = calleeName(expr);
  if (bareName !== null) {
    return { name: bareName, span, isCall: false, argumentCount: 0 };
  }

  // @decorator() or @ns.decorator()
  if (ts.isCallExpression(expr)) {
    const name = calleeName(expr.expression);
    if (!name) {
      return null;
    }
    return { name, span, isCall: true, argumentCount: expr.arguments.length };
  }

  return null;
}

/**
 * Name of an identifier or the last segment of a property access.
 */
export function calleeName(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) return expr.name.text;
  return null;
}

/* =============================================================================
 * FIELD EXTRACTION
 * ============================================================================= */

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (ts.canHaveModifiers(node)) {
    return ts.getModifiers(node)?.some(m => m.kind === kind) ?? false;
  }
  return false;
}

/**
 * Instance property declarations. Static, `declare` and `#private` members are
 * not fields.
 */
function extractFields(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): FieldInfo[] {
  const fields: FieldInfo[] = [];

  for (const member of node.members) {
    if (!ts.isPropertyDeclaration(member)) continue;
    if (hasModifier(member, ts.SyntaxKind.StaticKeyword)) continue;
    if (hasModifier(member, ts.SyntaxKind.DeclareKeyword)) continue;
    if (ts.isPrivateIdentifier(member.name)) continue;

    const start = member.getStart(sourceFile);
    fields.push({
      ...fieldName(member.name, sourceFile),
      span: { start, end: member.getEnd() },
      indent: lineIndent(sourceFile.text, start),
      optional: member.questionToken !== undefined,
      readonly: hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
      typeNode: member.type,
      initializer: member.initializer,
    });
  }

  return fields;
}

function fieldName(name: ts.PropertyName, sourceFile: ts.SourceFile): Pick<FieldInfo, "name" | "nameKind"> {
  if (ts.isIdentifier(name)) return { name: name.text, nameKind: "identifier" };
  if (ts.isStringLiteral(name)) return { name: name.text, nameKind: "string" };
  return { name: name.getText(sourceFile), nameKind: "computed" };
}

function memberName(member: ts.ClassElement): string | null {
  const name = member.name;
  if (!name) return null;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  return null;
}

/* =============================================================================
 * MODULE SCOPE
 * ============================================================================= */

/**
 * Collect the top-level names a type annotation may refer to.
 */
export function collectScope(sourceFile: ts.SourceFile): ModuleScope {
  const scope: ModuleScope = {
    classes: new Set(),
    interfaces: new Set(),
    enums: new Set(),
    aliases: new Map(),
    valueImports: new Set(),
    typeImports: new Set(),
    namespaceImports: new Set(),
  };

  for (const statement of sourceFile.statements) {
    if (ts.isClassDeclaration(statement) && statement.name) {
      scope.classes.add(statement.name.text);
    } else if (ts.isInterfaceDeclaration(statement)) {
      scope.interfaces.add(statement.name.text);
    } else if (ts.isEnumDeclaration(statement)) {
      scope.enums.add(statement.name.text);
    } else if (ts.isTypeAliasDeclaration(statement)) {
      scope.aliases.set(statement.name.text, statement);
    } else if (ts.isImportDeclaration(statement)) {
      collectImport(statement, scope);
    }
  }

  return scope;
}

function collectImport(statement: ts.ImportDeclaration, scope: ModuleScope): void {
  const clause = statement.importClause;
  if (!clause) return;

  const typeOnly = clause.isTypeOnly;
  if (clause.name) {
    (typeOnly ? scope.typeImports : scope.valueImports).add(clause.name.text);
  }

  const bindings = clause.namedBindings;
  if (!bindings) return;

  if (ts.isNamespaceImport(bindings)) {
    if (typeOnly) {
      scope.typeImports.add(bindings.name.text);
    } else {
      scope.namespaceImports.add(bindings.name.text);
    }
    return;
  }

  for (const element of bindings.elements) {
    (typeOnly || element.isTypeOnly ? scope.typeImports : scope.valueImports).add(element.name.text);
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/**
 * Find the position of the opening brace of the class body.
 */
function findOpenBrace(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): number {
  // Walk through children to find the opening brace
  const children = node.getChildren(sourceFile);
  for (const child of children) {
    if (child.kind === ts.SyntaxKind.OpenBraceToken) {
      return child.getStart(sourceFile);
    }
  }

  // Fallback: scan the text
  const text = sourceFile.text;
  const nodeStart = node.getStart(sourceFile);
  for (let i = nodeStart; i < text.length; i++) {
    if (text[i] === "{") {
      return i;
    }
  }

  return -1;
}

/**
 * Whitespace between the start of the line and `position`, or "" when other
 * text precedes it on that line.
 */
function lineIndent(text: string, position: number): string {
  const lineStart = text.lastIndexOf("\n", position - 1) + 1;
  const prefix = text.slice(lineStart, position);
  return /^[ \t]*$/.test(prefix) ? prefix : "";
}

function getHeritage(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): Heritage {
  const clause = node.heritageClauses?.find(c => c.token === ts.SyntaxKind.ExtendsKeyword);
  const [base] = clause?.types ?? [];
  if (!base) return { type: "none" };
  if (ts.isIdentifier(base.expression) && base.expression.text === "Map") {
    return { type: "map" };
  }
  return { type: "class", expression: base.expression.getText(sourceFile) };
}

/**
 * Determine the export type of a class.
 */
function getExportType(node: ts.ClassDeclaration): "none" | "named" | "default" {
  if (!ts.canHaveModifiers(node)) {
    return "none";
  }

  const modifiers = ts.getModifiers(node);
  if (!modifiers) {
    return "none";
  }

  let hasExport = false;
  let hasDefault = false;

  for (const mod of modifiers) {
    if (mod.kind === ts.SyntaxKind.ExportKeyword) {
      hasExport = true;
    }
    if (mod.kind === ts.SyntaxKind.DefaultKeyword) {
      hasDefault = true;
    }
  }

  if (hasExport && hasDefault) {
    return "default";
  }
  if (hasExport) {
    return "named";
  }
  return "none";
}
