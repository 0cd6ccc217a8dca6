/**
 * Transform Package - Type Mapping Tests
 */

import { describe, it, expect } from "vitest";
import { analyzeSource, mapTypeNode, optionalTypeCode, type TypeMapContext } from "@wiremap/transform";

/**
 * Map the annotation of `value` in a class declared after `prelude`.
 */
function mapAnnotation(annotation: string | null, prelude = ""): { code: string; warnings: string[] } {
  const member = annotation === null ? "value;" : `value: ${annotation};`;
  const source = `${prelude}\nclass Sample {\n  ${member}\n}\n`;
  const { sourceFile, classes, scope } = analyzeSource(source);
  const sample = classes.find(c => c.name === "Sample");
  const warnings: string[] = [];
  const ctx: TypeMapContext = {
    sourceFile,
    scope,
    ns: "$wm",
    deferredNames: ["Deferred"],
    warn: (_node, message) => warnings.push(message),
  };
  return { code: mapTypeNode(sample?.fields[0]?.typeNode, ctx), warnings };
}

function code(annotation: string, prelude = ""): string {
  return mapAnnotation(annotation, prelude).code;
}

describe("mapTypeNode", () => {
  describe("primitives", () => {
    it("maps keywords to builtins", () => {
      expect(code("string")).toBe("$wm.T.string");
      expect(code("number")).toBe("$wm.T.number");
      expect(code("boolean")).toBe("$wm.T.boolean");
      expect(code("bigint")).toBe("$wm.T.bigint");
      expect(code("unknown")).toBe("$wm.T.unknown");
      expect(code("any")).toBe("$wm.T.unknown");
      expect(code("undefined")).toBe("$wm.T.absent");
    });

    it("maps literal types to their primitive", () => {
      expect(code(`"us-east-1"`)).toBe("$wm.T.string");
      expect(code("42")).toBe("$wm.T.number");
      expect(code("-1")).toBe("$wm.T.number");
      expect(code("true")).toBe("$wm.T.boolean");
      expect(code("null")).toBe("$wm.T.absent");
    });

    it("treats a missing annotation as unknown", () => {
      expect(mapAnnotation(null)).toEqual({ code: "$wm.T.unknown", warnings: [] });
    });
  });

  describe("unions", () => {
    it("turns an absent member into optional", () => {
      expect(code("string | undefined")).toBe("$wm.T.optional($wm.T.string)");
      expect(code("undefined | string")).toBe("$wm.T.optional($wm.T.string)");
      expect(code("string | null | undefined")).toBe("$wm.T.optional($wm.T.string)");
    });

    it("keeps several members as a union", () => {
      expect(code("string | number")).toBe("$wm.T.union($wm.T.string, $wm.T.number)");
      expect(code("string | number | null")).toBe(
        "$wm.T.optional($wm.T.union($wm.T.string, $wm.T.number))"
      );
    });

    it("collapses members that map to the same type", () => {
      expect(code(`"private" | "public-read"`)).toBe("$wm.T.string");
    });
  });

  describe("containers", () => {
    it("maps array forms to list", () => {
      expect(code("string[]")).toBe("$wm.T.list($wm.T.string)");
      expect(code("Array<number>")).toBe("$wm.T.list($wm.T.number)");
      expect(code("ReadonlyArray<number>")).toBe("$wm.T.list($wm.T.number)");
      expect(code("readonly string[]")).toBe("$wm.T.list($wm.T.string)");
    });

    it("maps string-keyed records to map", () => {
      expect(code("Record<string, boolean>")).toBe("$wm.T.map($wm.T.boolean)");
      expect(code("{ [key: string]: number }")).toBe("$wm.T.map($wm.T.number)");
    });

    it("maps Deferred to deferred", () => {
      expect(code("Deferred<string[] | undefined>")).toBe(
        "$wm.T.deferred($wm.T.optional($wm.T.list($wm.T.string)))"
      );
    });
  });

  describe("names", () => {
    it("references classes declared in the module", () => {
      expect(code("Owner", "class Owner {}")).toBe(`$wm.T.ref("Owner", () => $wm.T.cls(Owner))`);
    });

    it("references value imports as classes", () => {
      expect(code("Website[]", `import { Website } from "./website.js";`)).toBe(
        `$wm.T.list($wm.T.ref("Website", () => $wm.T.cls(Website)))`
      );
    });

    it("references classes through namespace imports", () => {
      expect(code("models.Owner", `import * as models from "./models.js";`)).toBe(
        `$wm.T.ref("models.Owner", () => $wm.T.cls(models.Owner))`
      );
    });

    it("names types that only exist at compile time", () => {
      expect(code("Policy", "interface Policy {}")).toBe(`$wm.T.named("Policy")`);
      expect(code("Acl", "enum Acl { Private }")).toBe(`$wm.T.named("Acl")`);
      expect(code("Tags", `import type { Tags } from "./tags.js";`)).toBe(`$wm.T.named("Tags")`);
    });

    it("follows type aliases", () => {
      expect(code("Region", "type Region = string | undefined;")).toBe("$wm.T.optional($wm.T.string)");
    });

    it("names generic and self-referencing aliases", () => {
      expect(code("Box<string>", "type Box<V> = V[];")).toBe(`$wm.T.named("Box")`);
      expect(code("Tree", "type Tree = Tree[];")).toBe(`$wm.T.list($wm.T.named("Tree"))`);
    });
  });

  describe("fallbacks", () => {
    it("warns about names it cannot resolve", () => {
      expect(mapAnnotation("Missing")).toEqual({
        code: "$wm.T.unknown",
        warnings: [`Cannot resolve type "Missing"; using unknown`],
      });
    });

    it("warns about unsupported annotations", () => {
      expect(mapAnnotation("() => void")).toEqual({
        code: "$wm.T.unknown",
        warnings: [`Unsupported type annotation "() => void"; using unknown`],
      });
    });

    it("warns about records keyed by anything but string", () => {
      expect(mapAnnotation("Record<number, string>").warnings).toEqual([
        `Record keys must be string in "Record<number, string>"; using unknown`,
      ]);
    });
  });
});

describe("optionalTypeCode", () => {
  it("wraps a type once", () => {
    expect(optionalTypeCode("$wm.T.string", "$wm")).toBe("$wm.T.optional($wm.T.string)");
    expect(optionalTypeCode("$wm.T.optional($wm.T.string)", "$wm")).toBe("$wm.T.optional($wm.T.string)");
  });

  it("leaves absent alone", () => {
    expect(optionalTypeCode("$wm.T.absent", "$wm")).toBe("$wm.T.absent");
  });
});
