/**
 * Core Package - Value Access Tests
 *
 * get/set on input types, initialize on output types, property translation
 * and native mapping classes.
 */

import { describe, it, expect } from "vitest";
import {
  T,
  field,
  get,
  initialize,
  inputType,
  isNativeMappingClass,
  isPlainMapping,
  isWiremapError,
  outputPropertyTypes,
  outputType,
  property,
  resourcePropertyTypes,
  set,
  toPlainMapping,
  translateProperty,
  WiremapErrorCode,
  type WiremapErrorCodeType,
} from "@wiremap/core";

function codeOf(fn: () => unknown): WiremapErrorCodeType | undefined {
  try {
    fn();
  } catch (error) {
    return isWiremapError(error) ? error.code : undefined;
  }
  return undefined;
}

function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/* =============================================================================
 * INPUT TYPES
 * ============================================================================= */

class BucketArgs {
  static $fields = {
    bucketName: field(T.optional(T.string), property("bucket_name")),
    versioning: field(T.optional(T.boolean)),
  };
  declare bucketName: string | undefined;
  declare versioning: boolean | undefined;
}
inputType(BucketArgs);

describe("input types", () => {
  it("reads unset fields as undefined", () => {
    const args = new BucketArgs();
    expect(args.bucketName).toBeUndefined();
    expect(get(args, "bucket_name")).toBeUndefined();
  });

  it("writes through the field under its wire name", () => {
    const args = new BucketArgs();
    args.bucketName = "logs";

    expect(args.bucketName).toBe("logs");
    expect(get(args, "bucket_name")).toBe("logs");
    expect(get(args, "bucketName")).toBeUndefined();
  });

  it("set is visible through the field", () => {
    const args = new BucketArgs();
    set(args, "versioning", false);
    expect(args.versioning).toBe(false);
  });

  it("keeps instances separate", () => {
    const first = new BucketArgs();
    const second = new BucketArgs();
    first.bucketName = "first";
    expect(second.bucketName).toBeUndefined();
  });

  it("accepts wire names that are not declared fields", () => {
    const args = new BucketArgs();
    set(args, "extra", 1);
    expect(get(args, "extra")).toBe(1);
  });

  it("treats __proto__ as an ordinary wire name", () => {
    const args = new BucketArgs();
    set(args, "__proto__", "value");
    expect(get(args, "__proto__")).toBe("value");
    expect(get(args, "toString")).toBeUndefined();
  });

  it("keeps a __proto__ wire name as an ordinary key in type lookups", () => {
    class ProtoArgs {
      static $fields = { raw: field(T.string, property("__proto__")) };
    }
    class ProtoResult {
      static $fields = { raw: field(T.optional(T.number), property("__proto__")) };
      constructor(values: unknown) {
        initialize(this, values);
      }
    }
    inputType(ProtoArgs);
    outputType(ProtoResult);

    const resource = resourcePropertyTypes(ProtoArgs);
    expect(Object.keys(resource)).toEqual(["__proto__"]);
    expect(Object.getOwnPropertyDescriptor(resource, "__proto__")?.value).toEqual(T.string);

    const output = outputPropertyTypes(ProtoResult);
    expect(Object.keys(output)).toEqual(["__proto__"]);
    expect(Object.getOwnPropertyDescriptor(output, "__proto__")?.value).toEqual(T.number);
  });

  it("stores an explicit undefined", () => {
    const args = new BucketArgs();
    args.bucketName = undefined;
    expect(Object.keys(toPlainMapping(args))).toEqual(["bucket_name"]);
  });

  it("does not add own properties to the instance", () => {
    const args = new BucketArgs();
    args.bucketName = "logs";
    expect(Object.keys(args)).toEqual([]);
  });

  it("rejects an empty wire name", () => {
    const args = new BucketArgs();
    expect(codeOf(() => get(args, ""))).toBe(WiremapErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => set(args, "", 1))).toBe(WiremapErrorCode.INVALID_ARGUMENT);
  });
});

describe("toPlainMapping", () => {
  it("copies the Value Store keyed by wire name", () => {
    const args = new BucketArgs();
    args.versioning = true;
    args.bucketName = "logs";

    const mapping = toPlainMapping(args);
    expect(mapping).toEqual({ versioning: true, bucket_name: "logs" });

    mapping["bucket_name"] = "changed";
    expect(args.bucketName).toBe("logs");
  });

  it("returns an empty object before any write", () => {
    expect(toPlainMapping(new BucketArgs())).toEqual({});
  });
});

/* =============================================================================
 * OUTPUT TYPES
 * ============================================================================= */

class BucketResult {
  static $fields = {
    arn: field(T.string),
    bucketName: field(T.optional(T.string), property("bucket_name")),
  };
  declare readonly arn: string | undefined;
  declare readonly bucketName: string | undefined;

  constructor(values: unknown) {
    initialize(this, values);
  }
}
outputType(BucketResult);

describe("output types", () => {
  it("reads fields from the initializer payload", () => {
    const result = new BucketResult({ arn: "arn:test:bucket", bucket_name: "logs" });
    expect(result.arn).toBe("arn:test:bucket");
    expect(result.bucketName).toBe("logs");
  });

  it("reads missing keys as undefined", () => {
    expect(new BucketResult({}).arn).toBeUndefined();
  });

  it("keeps the payload object as given", () => {
    const payload: Record<string, unknown> = { arn: "before" };
    const result = new BucketResult(payload);
    payload["arn"] = "after";
    expect(result.arn).toBe("after");
  });

  it("accepts a null-prototype payload", () => {
    const payload: Record<string, unknown> = Object.create(null);
    payload["arn"] = "arn:test:bare";
    expect(new BucketResult(payload).arn).toBe("arn:test:bare");
  });

  it("rejects payloads that are not plain objects", () => {
    expect(codeOf(() => new BucketResult(42))).toBe(WiremapErrorCode.TYPE_MISMATCH);
    expect(codeOf(() => new BucketResult(null))).toBe(WiremapErrorCode.TYPE_MISMATCH);
    expect(codeOf(() => new BucketResult(["arn"]))).toBe(WiremapErrorCode.TYPE_MISMATCH);
    expect(codeOf(() => new BucketResult(new Map()))).toBe(WiremapErrorCode.TYPE_MISMATCH);
    expect(() => new BucketResult("text")).toThrow("Expected value to be a plain object");
  });

  it("has no setters", () => {
    const result = new BucketResult({ arn: "arn:test:bucket" });
    expect(Reflect.set(result, "arn", "other")).toBe(false);
    expect(result.arn).toBe("arn:test:bucket");
  });

  it("rejects set and toPlainMapping", () => {
    const result = new BucketResult({});
    expect(codeOf(() => set(result, "arn", "x"))).toBe(WiremapErrorCode.USAGE_ERROR);
    expect(codeOf(() => toPlainMapping(result))).toBe(WiremapErrorCode.USAGE_ERROR);
  });

  it("rejects initialize on an input instance", () => {
    expect(codeOf(() => initialize(new BucketArgs(), {}))).toBe(WiremapErrorCode.USAGE_ERROR);
  });
});

describe("property translation", () => {
  it("maps wire names through translateProperty before lookup", () => {
    class Tagged {
      static $fields = { createdAt: field(T.string) };
      declare readonly createdAt: string | undefined;

      constructor(values: unknown) {
        initialize(this, values);
      }

      [translateProperty](name: string): string {
        return snakeCase(name);
      }
    }
    outputType(Tagged);

    const tagged = new Tagged({ created_at: "2024-01-01", createdAt: "ignored" });
    expect(tagged.createdAt).toBe("2024-01-01");
  });

  it("reads native mapping subclasses through Map storage", () => {
    class Payload extends Map<string, unknown> {
      static $fields = { bucketName: field(T.optional(T.string)) };
      declare readonly bucketName: string | undefined;

      [translateProperty](name: string): string {
        return snakeCase(name);
      }
    }
    outputType(Payload);

    const payload = new Payload([["bucket_name", "logs"]]);
    expect(payload.bucketName).toBe("logs");
    expect(get(payload, "bucketName")).toBe("logs");
    expect(isNativeMappingClass(Payload)).toBe(true);
  });

  it("ignores a subclass override of Map#get", () => {
    class Shadowing extends Map<string, unknown> {
      static $fields = { region: field(T.string) };
      declare readonly region: string | undefined;

      override get(_key: string): unknown {
        return "shadowed";
      }
    }
    outputType(Shadowing);

    expect(new Shadowing([["region", "eu-west-1"]]).region).toBe("eu-west-1");
  });

  it("does not synthesize equals on native mapping classes", () => {
    class Payload extends Map<string, unknown> {}
    outputType(Payload);
    expect(Object.hasOwn(Payload.prototype, "equals")).toBe(false);
  });
});

/* =============================================================================
 * UNREGISTERED CLASSES
 * ============================================================================= */

describe("unregistered classes", () => {
  class Plain {}

  it("rejects get and set", () => {
    expect(codeOf(() => get(new Plain(), "name"))).toBe(WiremapErrorCode.USAGE_ERROR);
    expect(codeOf(() => set(new Plain(), "name", 1))).toBe(WiremapErrorCode.USAGE_ERROR);
  });

  it("rejects toPlainMapping", () => {
    expect(codeOf(() => toPlainMapping(new Plain()))).toBe(WiremapErrorCode.USAGE_ERROR);
  });

  it("rejects get on a null-prototype object", () => {
    expect(codeOf(() => get(Object.create(null), "name"))).toBe(WiremapErrorCode.USAGE_ERROR);
  });
});

describe("helpers", () => {
  it("isPlainMapping accepts object literals only", () => {
    expect(isPlainMapping({})).toBe(true);
    expect(isPlainMapping(Object.create(null))).toBe(true);
    expect(isPlainMapping([])).toBe(false);
    expect(isPlainMapping(new Map())).toBe(false);
    expect(isPlainMapping(new BucketArgs())).toBe(false);
  });

  it("isNativeMappingClass walks the class chain", () => {
    class Direct extends Map<string, number> {}
    class Indirect extends Direct {}
    expect(isNativeMappingClass(Map)).toBe(true);
    expect(isNativeMappingClass(Indirect)).toBe(true);
    expect(isNativeMappingClass(BucketArgs)).toBe(false);
  });
});
