/**
 * Core Package - Equality Tests
 */

import { describe, it, expect } from "vitest";
import { T, equals, field, initialize, inputType, mappingsEqual, outputType } from "@wiremap/core";

class Point {
  static $fields = { x: field(T.number), y: field(T.number) };
  constructor(values: unknown) {
    initialize(this, values);
  }
}
outputType(Point);

class OtherPoint {
  static $fields = { x: field(T.number), y: field(T.number) };
  constructor(values: unknown) {
    initialize(this, values);
  }
}
outputType(OtherPoint);

describe("synthesized equals", () => {
  it("compares Value Stores of the same class", () => {
    expect(equals(new Point({ x: 1, y: 2 }), new Point({ x: 1, y: 2 }))).toBe(true);
    expect(equals(new Point({ x: 1, y: 2 }), new Point({ x: 1, y: 3 }))).toBe(false);
    expect(equals(new Point({ x: 1 }), new Point({ x: 1, y: 2 }))).toBe(false);
  });

  it("requires the exact same class", () => {
    expect(equals(new Point({ x: 1, y: 2 }), new OtherPoint({ x: 1, y: 2 }))).toBe(false);
    expect(equals(new Point({ x: 1, y: 2 }), { x: 1, y: 2 })).toBe(false);
    expect(equals(new Point({}), null)).toBe(false);
  });

  it("distinguishes a subclass from its base", () => {
    class Point3 extends Point {}
    expect(equals(new Point({ x: 0 }), new Point3({ x: 0 }))).toBe(false);
  });

  it("compares nested arrays and objects by value", () => {
    class Shape {
      static $fields = { points: field(T.list(T.map(T.number))) };
      constructor(values: unknown) {
        initialize(this, values);
      }
    }
    outputType(Shape);

    const a = new Shape({ points: [{ x: 1 }, { x: 2 }], meta: { tags: ["a"] } });
    const b = new Shape({ points: [{ x: 1 }, { x: 2 }], meta: { tags: ["a"] } });
    const c = new Shape({ points: [{ x: 1 }], meta: { tags: ["a"] } });

    expect(equals(a, b)).toBe(true);
    expect(equals(a, c)).toBe(false);
  });

  it("compares nested dates and maps by value", () => {
    class Event {
      static $fields = { at: field(T.unknown), labels: field(T.unknown) };
      constructor(values: unknown) {
        initialize(this, values);
      }
    }
    outputType(Event);

    const build = (time: number, labels: [string, unknown][]) =>
      new Event({ at: new Date(time), labels: new Map(labels) });

    expect(equals(build(1000, [["env", "test"]]), build(1000, [["env", "test"]]))).toBe(true);
    expect(equals(build(1000, [["env", "test"]]), build(2000, [["env", "test"]]))).toBe(false);
    expect(equals(build(1000, [["env", "test"]]), build(1000, [["env", "prod"]]))).toBe(false);
    expect(equals(build(1000, [["env", "test"]]), build(1000, [["env", "test"], ["tier", 1]]))).toBe(false);
    expect(equals(build(1000, [["tags", ["a"]]]), build(1000, [["tags", ["a"]]]))).toBe(true);
  });

  it("compares nested registered instances through their equals", () => {
    class Line {
      static $fields = { start: field(T.cls(Point)) };
      constructor(values: unknown) {
        initialize(this, values);
      }
    }
    outputType(Line);

    const a = new Line({ start: new Point({ x: 0, y: 0 }) });
    const b = new Line({ start: new Point({ x: 0, y: 0 }) });
    expect(equals(a, b)).toBe(true);
  });

  it("treats input instances with no writes as equal", () => {
    class Args {
      static $fields = { name: field(T.optional(T.string)) };
      declare name: string | undefined;
    }
    inputType(Args);

    const a = new Args();
    const b = new Args();
    expect(equals(a, b)).toBe(true);

    a.name = "x";
    expect(equals(a, b)).toBe(false);

    b.name = "x";
    expect(equals(a, b)).toBe(true);
  });

  it("defines equals as a non-enumerable prototype method", () => {
    const descriptor = Object.getOwnPropertyDescriptor(Point.prototype, "equals");
    expect(typeof descriptor?.value).toBe("function");
    expect(descriptor?.enumerable).toBe(false);
  });

  it("keeps an equals method the class defines", () => {
    class ById {
      static $fields = { id: field(T.string), label: field(T.string) };
      declare readonly id: string | undefined;

      constructor(values: unknown) {
        initialize(this, values);
      }

      equals(other: unknown): boolean {
        return other instanceof ById && other.id === this.id;
      }
    }
    outputType(ById);

    expect(equals(new ById({ id: "a", label: "x" }), new ById({ id: "a", label: "y" }))).toBe(true);
  });
});

describe("equals", () => {
  it("falls back to Object.is without an equals method", () => {
    expect(equals(1, 1)).toBe(true);
    expect(equals(Number.NaN, Number.NaN)).toBe(true);
    expect(equals({}, {})).toBe(false);
  });
});

describe("mappingsEqual", () => {
  it("compares keys and values", () => {
    expect(mappingsEqual({ a: 1 }, { a: 1 })).toBe(true);
    expect(mappingsEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(mappingsEqual({ a: undefined }, { b: undefined })).toBe(false);
  });

  it("handles missing stores", () => {
    expect(mappingsEqual(undefined, undefined)).toBe(true);
    expect(mappingsEqual(undefined, {})).toBe(false);
  });
});
