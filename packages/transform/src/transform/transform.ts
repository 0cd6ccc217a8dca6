/**
 * Transform Package - Main Transform Function
 *
 * Rewrites classes decorated with `@inputType` / `@outputType` into their
 * runtime form: a `$fields` table, Value Store accessors in place of the field
 * declarations, and a registration call after the class.
 */

import ts from "typescript";
import { debug } from "@wiremap/core";
import {
  emitAccessors,
  emitConstructor,
  emitEqualsDeclaration,
  emitFieldTable,
  emitRegistration,
  type EmitField,
  type EmitOptions,
} from "../emit/index.js";
import { analyzeSource, calleeName, detectClassKind } from "../ts/analyze.js";
import { applyEdits, deleteWithWhitespace, insert, replace, validateEdits } from "../ts/edit.js";
import {
  findRemainingReferences,
  generateImportCleanupEdits,
  generateNamespaceImportEdit,
  hasNamespaceImport,
} from "../ts/imports.js";
import { mapTypeNode, optionalTypeCode, type TypeMapContext } from "../ts/type-map.js";
import type { ClassInfo, DecoratorInfo, FieldInfo, Span, TypedSourceEdit } from "../ts/types.js";
import {
  TransformError,
  TransformErrorCode,
  TransformWarningCode,
  type TransformErrorCodeType,
  type TransformOptions,
  type TransformResult,
  type TransformWarning,
  type TransformWarningCodeType,
  type TransformedClass,
  type TransformedField,
} from "./types.js";

export const DEFAULT_RUNTIME_MODULE = "@wiremap/core";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Transform a TypeScript source file's decorated property classes.
 *
 * @example
 * ```typescript
 * const result = transform({
 *   source: `@inputType
 * export class BucketArgs {
 *   bucketName?: string = property("bucket_name");
 * }`,
 *   filePath: "src/bucket.ts",
 * });
 *
 * // result.code declares static $fields, a bucketName accessor pair and
 * // ends with $wm.inputType(BucketArgs);
 * ```
 */
export function transform(options: TransformOptions): TransformResult {
  const {
    source,
    filePath,
    runtimeModule = DEFAULT_RUNTIME_MODULE,
    namespace = "$wm",
    inputDecorators = ["inputType"],
    outputDecorators = ["outputType"],
    propertyFactories = ["property"],
    deferredNames = ["Deferred"],
    indent = "  ",
    removeImports = true,
  } = options;

  const { sourceFile, classes, scope } = analyzeSource(source, filePath);
  const warnings: TransformWarning[] = [];

  function warnAt(node: ts.Node, code: TransformWarningCodeType, message: string): void {
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
    warnings.push({ code, message, file: filePath, line: line + 1, column: character });
  }

  const typeContext: TypeMapContext = {
    sourceFile,
    scope,
    ns: namespace,
    deferredNames,
    warn: (node, message) => warnAt(node, TransformWarningCode.UNKNOWN_TYPE, message),
  };

  const kindNames = { input: inputDecorators, output: outputDecorators };
  const moduleClasses = new Map<string, ClassInfo>();
  const outputClasses = new Set<ClassInfo>();
  for (const classInfo of classes) {
    if (classInfo.name && !moduleClasses.has(classInfo.name)) {
      moduleClasses.set(classInfo.name, classInfo);
    }
    if (detectClassKind(classInfo, kindNames).kind === "output") {
      outputClasses.add(classInfo);
    }
  }

  const state: ClassTransformState = {
    source,
    sourceFile,
    filePath,
    typeContext,
    emit: { ns: namespace, indent },
    propertyFactories,
    moduleClasses,
    outputClasses,
    consumedImports: new Set(),
    consumedSpans: [],
    warnings,
  };

  const edits: TypedSourceEdit[] = [];
  const transformed: TransformedClass[] = [];

  for (const classInfo of classes) {
    const detected = detectClassKind(classInfo, kindNames);
    if (detected.kind === "none") continue;

    if (detected.kind === "conflict") {
      throw errorAt(
        state,
        classInfo.start,
        `Class ${classInfo.name || "(anonymous)"} has more than one of ${detected.decorators.map(d => `@${d.name}`).join(", ")}`,
        TransformErrorCode.CONFLICTING_KINDS
      );
    }

    const result = transformClass(state, classInfo, detected.kind, detected.decorator);
    edits.push(...result.edits);
    transformed.push(result.meta);
  }

  if (transformed.length === 0) {
    return { code: source, edits: [], warnings, classes: [] };
  }

  if (!hasNamespaceImport(sourceFile, namespace, runtimeModule)) {
    edits.unshift(generateNamespaceImportEdit(sourceFile, namespace, runtimeModule));
  }

  if (removeImports) {
    const stillUsed = findRemainingReferences(sourceFile, state.consumedImports, state.consumedSpans);
    const unused = [...state.consumedImports].filter(name => !stillUsed.has(name));
    const cleanup = generateImportCleanupEdits(source, unused, runtimeModule);
    edits.push(...cleanup.edits);
    if (cleanup.removedSpecifiers.length > 0) {
      warnings.push({
        code: TransformWarningCode.INFO,
        message: `Removed unused imports: ${cleanup.removedSpecifiers.join(", ")}`,
        file: filePath,
      });
    }
  }

  // Validate edits don't conflict
  if (!validateEdits(edits)) {
    throw new TransformError(
      "Generated edits have overlapping spans",
      TransformErrorCode.EDIT_CONFLICT,
      filePath
    );
  }

  const code = applyEdits(source, edits);
  debug.transform("file", {
    file: filePath,
    classes: transformed.map(c => c.className),
    edits: edits.length,
    warnings: warnings.length,
  });

  return { code, edits, warnings, classes: transformed };
}

/* =============================================================================
 * CLASS TRANSFORMATION
 * ============================================================================= */

interface ClassTransformState {
  source: string;
  sourceFile: ts.SourceFile;
  filePath: string;
  typeContext: TypeMapContext;
  emit: EmitOptions;
  propertyFactories: readonly string[];
  /** Named classes declared anywhere in the module */
  moduleClasses: ReadonlyMap<string, ClassInfo>;
  /** Classes decorated as output types */
  outputClasses: ReadonlySet<ClassInfo>;
  /** Runtime import names the rewritten code uses in place */
  consumedImports: Set<string>;
  /** Source the rewrite removes: decorators and factory calls */
  consumedSpans: Span[];
  warnings: TransformWarning[];
}

/**
 * Where an output class's constructor would come from:
 * - `none`: the class has no base class
 * - `plain`: a base in this module that is not an output type
 * - `output`: an output type in this module, directly or up the chain
 * - `map`: `Map`, directly or up the chain
 * - `external`: a base declared elsewhere
 */
type BaseConstructor = "none" | "plain" | "output" | "map" | "external";

interface PlannedField {
  info: FieldInfo;
  emit: EmitField;
  hasDefault: boolean;
}

function transformClass(
  state: ClassTransformState,
  classInfo: ClassInfo,
  kind: "input" | "output",
  decorator: DecoratorInfo
): { edits: TypedSourceEdit[]; meta: TransformedClass } {
  const { source, emit } = state;

  if (!classInfo.name) {
    throw errorAt(
      state,
      classInfo.start,
      `Classes decorated with @${decorator.name} must be named`,
      TransformErrorCode.NO_CLASS_NAME
    );
  }

  state.consumedImports.add(decorator.name);
  state.consumedSpans.push(decorator.span);
  const fields = classInfo.fields.map(field => planField(state, classInfo, field));
  const memberIndent = classInfo.fields[0]?.indent || classInfo.indent + emit.indent;
  const base = baseConstructor(state, classInfo);

  const emitsConstructor = kind === "output" && !classInfo.hasConstructor && (base === "none" || base === "plain");
  if (kind === "output" && classInfo.hasConstructor && base !== "map") {
    state.warnings.push({
      code: TransformWarningCode.OWN_CONSTRUCTOR,
      message: `Output type ${classInfo.name} defines its own constructor; it must call ${emit.ns}.initialize(this, values)`,
      file: state.filePath,
    });
  }
  if (kind === "output" && !classInfo.hasConstructor && base === "external" && classInfo.heritage.type === "class") {
    state.warnings.push({
      code: TransformWarningCode.INHERITED_CONSTRUCTOR,
      message: `Output type ${classInfo.name} extends ${classInfo.heritage.expression}, whose constructor comes from another module; that constructor must be an output type's, or ${classInfo.name} must call ${emit.ns}.initialize(this, values)`,
      file: state.filePath,
    });
  }

  const blocks: string[] = [];
  if (fields.length > 0) {
    blocks.push(emitFieldTable(fields.map(f => f.emit), memberIndent, emit));
  }
  if (emitsConstructor) {
    blocks.push(emitConstructor(memberIndent, emit, base === "plain"));
  }
  if (!classInfo.hasEquals && base !== "map") {
    blocks.push(emitEqualsDeclaration(memberIndent));
  }

  const edits: TypedSourceEdit[] = [deleteWithWhitespace(source, decorator.span)];
  if (blocks.length > 0) {
    edits.push(insert(classInfo.bodyStart + 1, `\n${blocks.join("\n\n")}\n`));
  }
  for (const field of fields) {
    edits.push(replace(field.info.span, emitAccessors(field.emit, kind, field.info.indent || memberIndent, emit)));
  }
  edits.push(insert(classInfo.end, `\n${emitRegistration(classInfo.name, kind, classInfo.indent, emit)}`));

  debug.transform("class", {
    className: classInfo.name,
    kind,
    fields: fields.map(f => f.emit.wireName),
    constructorEmitted: emitsConstructor,
  });

  return {
    edits,
    meta: {
      className: classInfo.name,
      kind,
      fields: fields.map((f): TransformedField => ({
        name: f.emit.name,
        wireName: f.emit.wireName,
        typeCode: f.emit.typeCode,
        hasDefault: f.hasDefault,
      })),
      constructorEmitted: emitsConstructor,
    },
  };
}

/**
 * Work out a field's wire name, declared type and default.
 */
function planField(state: ClassTransformState, classInfo: ClassInfo, info: FieldInfo): PlannedField {
  const { sourceFile, typeContext, emit } = state;

  if (info.nameKind === "computed") {
    throw errorAt(
      state,
      info.span.start,
      `Field ${info.name} of ${classInfo.name} has a computed name`,
      TransformErrorCode.UNSUPPORTED_MEMBER
    );
  }

  if (!info.typeNode) {
    state.warnings.push({
      ...positionOf(state, info.span.start),
      code: TransformWarningCode.MISSING_ANNOTATION,
      message: `Field ${info.name} of ${classInfo.name} has no type annotation; using unknown`,
      file: state.filePath,
    });
  }

  let typeCode = mapTypeNode(info.typeNode, typeContext);
  if (info.optional) {
    typeCode = optionalTypeCode(typeCode, emit.ns);
  }

  const base = {
    name: info.name,
    typeCode,
    typeText: typeText(info.typeNode, sourceFile),
  };

  const init = info.initializer;
  if (!init) {
    return { info, emit: { ...base, wireName: info.name }, hasDefault: false };
  }

  const factory = ts.isCallExpression(init) ? calleeName(init.expression) : null;
  if (ts.isCallExpression(init) && factory !== null && state.propertyFactories.includes(factory)) {
    const [wireArg, defaultArg] = init.arguments;
    if (!wireArg || !ts.isStringLiteralLike(wireArg) || wireArg.text.length === 0) {
      throw errorAt(
        state,
        init.getStart(sourceFile),
        `Field ${info.name} of ${classInfo.name}: ${factory}() needs a non-empty string literal wire name`,
        TransformErrorCode.UNSUPPORTED_MEMBER
      );
    }
    state.consumedImports.add(factory);
    state.consumedSpans.push({ start: init.getStart(sourceFile), end: init.getEnd() });
    const args = init.arguments.map(arg => arg.getText(sourceFile)).join(", ");
    return {
      info,
      emit: { ...base, wireName: wireArg.text, defaultCode: `${emit.ns}.property(${args})` },
      hasDefault: defaultArg !== undefined,
    };
  }

  return {
    info,
    emit: { ...base, wireName: info.name, defaultCode: init.getText(sourceFile) },
    hasDefault: true,
  };
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/**
 * Follow `extends` through classes declared in this module.
 */
function baseConstructor(state: ClassTransformState, classInfo: ClassInfo): BaseConstructor {
  const seen = new Set<ClassInfo>([classInfo]);
  let current = classInfo;

  for (;;) {
    const heritage = current.heritage;
    if (heritage.type === "none") return current === classInfo ? "none" : "plain";
    if (heritage.type === "map") return "map";

    const base = state.moduleClasses.get(heritage.expression);
    if (!base || seen.has(base)) return "external";
    if (state.outputClasses.has(base)) return "output";
    if (base.hasConstructor) return "plain";

    seen.add(base);
    current = base;
  }
}

/**
 * Annotation text for accessor signatures. Function-like types are
 * parenthesized so `| undefined` binds to the whole type.
 */
function typeText(node: ts.TypeNode | undefined, sourceFile: ts.SourceFile): string {
  if (!node) return "unknown";
  const text = node.getText(sourceFile);
  if (ts.isFunctionTypeNode(node) || ts.isConstructorTypeNode(node) || ts.isConditionalTypeNode(node)) {
    return `(${text})`;
  }
  return text;
}

function positionOf(state: ClassTransformState, offset: number): { line: number; column: number } {
  const { line, character } = state.sourceFile.getLineAndCharacterOfPosition(offset);
  return { line: line + 1, column: character };
}

function errorAt(
  state: ClassTransformState,
  offset: number,
  message: string,
  code: TransformErrorCodeType
): TransformError {
  const { line, column } = positionOf(state, offset);
  return new TransformError(message, code, state.filePath, line, column);
}
