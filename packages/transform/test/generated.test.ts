/**
 * Transform Package - Generated Module Tests
 *
 * Writes transformed modules to disk, loads them, and uses the classes they
 * export against the runtime.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  equals,
  get,
  isInputType,
  isOutputType,
  isProperty,
  isWiremapError,
  toPlainMapping,
  WiremapErrorCode,
  type WiremapErrorCodeType,
} from "@wiremap/core";
import { transform } from "@wiremap/transform";

const outDir = fileURLToPath(new URL("./generated/", import.meta.url));

type LoadedModule = Record<string, unknown>;

async function load(name: string, source: string): Promise<LoadedModule> {
  const { code } = transform({ source, filePath: `${name}.ts` });
  const file = join(outDir, `${name}.ts`);
  writeFileSync(file, code);
  const loaded: LoadedModule = await import(file);
  return loaded;
}

function exported(module: LoadedModule, name: string): Function {
  const value = module[name];
  if (typeof value !== "function") throw new Error(`${name} is not an exported class`);
  return value;
}

function construct(module: LoadedModule, name: string, ...args: unknown[]): object {
  const instance: object = Reflect.construct(exported(module, name), args);
  return instance;
}

function codeOf(fn: () => unknown): WiremapErrorCodeType | undefined {
  try {
    fn();
  } catch (error) {
    return isWiremapError(error) ? error.code : undefined;
  }
  return undefined;
}

beforeAll(() => {
  mkdirSync(outDir, { recursive: true });
});

afterAll(() => {
  rmSync(outDir, { recursive: true, force: true });
});

describe("generated modules", () => {
  it("round-trips input fields through the Value Store", async () => {
    const module = await load("bucket-args", [
      `import { inputType, property } from "@wiremap/core";`,
      ``,
      `@inputType`,
      `export class BucketArgs {`,
      `  bucketName?: string = property("bucket_name");`,
      `  forceDestroy?: boolean;`,
      `}`,
      ``,
    ].join("\n"));

    expect(isInputType(exported(module, "BucketArgs"))).toBe(true);

    const args = construct(module, "BucketArgs");
    Reflect.set(args, "bucketName", "logs");
    Reflect.set(args, "forceDestroy", true);

    expect(Reflect.get(args, "bucketName")).toBe("logs");
    expect(get(args, "bucket_name")).toBe("logs");
    expect(toPlainMapping(args)).toEqual({ bucket_name: "logs", forceDestroy: true });

    const other = construct(module, "BucketArgs");
    expect(equals(args, other)).toBe(false);
    Reflect.set(other, "forceDestroy", true);
    Reflect.set(other, "bucketName", "logs");
    expect(equals(args, other)).toBe(true);
  });

  it("initializes output types from a payload", async () => {
    const module = await load("bucket-result", [
      `import { outputType } from "@wiremap/core";`,
      ``,
      `@outputType`,
      `export class BucketResult {`,
      `  id: string;`,
      `  tags?: string[];`,
      `}`,
      ``,
    ].join("\n"));

    expect(isOutputType(exported(module, "BucketResult"))).toBe(true);

    const result = construct(module, "BucketResult", { id: "b-1", tags: ["a"] });
    expect(Reflect.get(result, "id")).toBe("b-1");
    expect(Reflect.get(result, "tags")).toEqual(["a"]);

    expect(equals(result, construct(module, "BucketResult", { id: "b-1", tags: ["a"] }))).toBe(true);
    expect(equals(result, construct(module, "BucketResult", { id: "b-2", tags: ["a"] }))).toBe(false);
    expect(codeOf(() => construct(module, "BucketResult", 5))).toBe(WiremapErrorCode.TYPE_MISMATCH);
  });

  it("initializes output types that extend a plain class", async () => {
    const module = await load("extended-result", [
      `import { outputType } from "@wiremap/core";`,
      ``,
      `export class Base {`,
      `  tag = "b";`,
      `}`,
      ``,
      `@outputType`,
      `export class Out extends Base {`,
      `  a?: number;`,
      `}`,
      ``,
    ].join("\n"));

    const out = construct(module, "Out", { a: 1 });
    expect(Reflect.get(out, "a")).toBe(1);
    expect(Reflect.get(out, "tag")).toBe("b");
    expect(codeOf(() => construct(module, "Out", 5))).toBe(WiremapErrorCode.TYPE_MISMATCH);
  });

  it("keeps runtime imports the module still uses", async () => {
    const module = await load("shared-imports", [
      `import { inputType, property } from "@wiremap/core";`,
      ``,
      `export const shared = property("shared_wire");`,
      `export const Registered = inputType(class {});`,
      ``,
      `@inputType`,
      `export class A {`,
      `  a?: string = property("a_wire");`,
      `}`,
      ``,
    ].join("\n"));

    const shared = module["shared"];
    expect(isProperty(shared) && shared.wireName).toBe("shared_wire");
    expect(isInputType(exported(module, "Registered"))).toBe(true);

    const a = construct(module, "A");
    Reflect.set(a, "a", "x");
    expect(toPlainMapping(a)).toEqual({ a_wire: "x" });
  });
});
