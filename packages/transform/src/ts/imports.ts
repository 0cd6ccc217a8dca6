/**
 * Transform Package - Import Editing
 *
 * Adds the runtime namespace import and removes import specifiers that the
 * transformation left unused.
 */

import ts from "typescript";
import { parseSource } from "./analyze.js";
import { deleteWithWhitespace, insert, replace } from "./edit.js";
import type { Span, TypedSourceEdit } from "./types.js";

export interface ImportCleanupResult {
  /** Edits removing the specifiers */
  edits: TypedSourceEdit[];

  /** Names that were removed, in source order */
  removedSpecifiers: string[];
}

/**
 * Remove named import specifiers by local name. An import left with nothing
 * is removed entirely. `type` specifiers are never removed.
 *
 * @param moduleSpecifier - Only touch imports from this module, when given
 */
export function generateImportCleanupEdits(
  source: string,
  unusedNames: readonly string[],
  moduleSpecifier?: string
): ImportCleanupResult {
  const sourceFile = parseSource(source);
  const edits: TypedSourceEdit[] = [];
  const removedSpecifiers: string[] = [];

  for (const statement of sourceFile.statements) {
    if (!ts.isImportDeclaration(statement)) continue;
    if (!ts.isStringLiteral(statement.moduleSpecifier)) continue;
    if (moduleSpecifier !== undefined && statement.moduleSpecifier.text !== moduleSpecifier) continue;

    const clause = statement.importClause;
    if (!clause || clause.isTypeOnly) continue;
    const bindings = clause.namedBindings;
    if (!bindings || !ts.isNamedImports(bindings)) continue;

    const elements = bindings.elements;
    const removed = elements.filter(el => !el.isTypeOnly && unusedNames.includes(el.name.text));
    if (removed.length === 0) continue;

    removedSpecifiers.push(...removed.map(el => el.name.text));
    const kept = elements.filter(el => !removed.includes(el));

    if (kept.length > 0) {
      // import { a, b, c } → import { a, c }
      const text = kept.map(el => el.getText(sourceFile)).join(", ");
      edits.push(replace({ start: bindings.getStart(sourceFile), end: bindings.getEnd() }, `{ ${text} }`));
    } else if (clause.name) {
      // import X, { a } → import X
      edits.push(replace({ start: clause.name.getEnd(), end: bindings.getEnd() }, ""));
    } else {
      edits.push(deleteWithWhitespace(source, { start: statement.getStart(sourceFile), end: statement.getEnd() }));
    }
  }

  return { edits, removedSpecifiers };
}

/**
 * Insert `import * as ns from "module"` before the first statement, after any
 * leading comments.
 */
export function generateNamespaceImportEdit(
  sourceFile: ts.SourceFile,
  ns: string,
  moduleSpecifier: string
): TypedSourceEdit {
  const [first] = sourceFile.statements;
  const position = first ? first.getStart(sourceFile) : sourceFile.getEnd();
  return insert(position, `import * as ${ns} from "${moduleSpecifier}";\n`);
}

/**
 * Whether the module already imports `moduleSpecifier` as namespace `ns`.
 */
export function hasNamespaceImport(sourceFile: ts.SourceFile, ns: string, moduleSpecifier: string): boolean {
  return sourceFile.statements.some(statement =>
    ts.isImportDeclaration(statement) &&
    ts.isStringLiteral(statement.moduleSpecifier) &&
    statement.moduleSpecifier.text === moduleSpecifier &&
    statement.importClause?.isTypeOnly !== true &&
    statement.importClause?.namedBindings !== undefined &&
    ts.isNamespaceImport(statement.importClause.namedBindings) &&
    statement.importClause.namedBindings.name.text === ns
  );
}

/**
 * Which of `names` the module still refers to outside `excluded` spans and
 * outside its import declarations. Property names after a dot do not count.
 */
export function findRemainingReferences(
  sourceFile: ts.SourceFile,
  names: ReadonlySet<string>,
  excluded: readonly Span[]
): Set<string> {
  const found = new Set<string>();

  function isExcluded(node: ts.Node): boolean {
    const start = node.getStart(sourceFile);
    return excluded.some(span => start >= span.start && node.getEnd() <= span.end);
  }

  function visit(node: ts.Node): void {
    if (ts.isImportDeclaration(node)) return;
    if (ts.isIdentifier(node) && names.has(node.text)) {
      const parent = node.parent;
      const isMemberName = ts.isPropertyAccessExpression(parent) && parent.name === node;
      if (!isMemberName && !isExcluded(node)) found.add(node.text);
    }
    ts.forEachChild(node, visit);
  }

  ts.forEachChild(sourceFile, visit);
  return found;
}
