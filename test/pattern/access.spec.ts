// test/pattern/access.spec.ts
// Key/Keys/Attr/Attrs: lookups that fail instead of throwing

import { describe, it, expect } from "vitest";
import { done, NO_MATCH } from "../../src/outcome/constructors";
import { attempt } from "../../src/core/pattern/pattern";
import { Attr, Attrs, Key, Keys } from "../../src/core/pattern/access";

describe("Key", () => {
  it("extracts a property from an object", () => {
    expect(attempt(new Key("type"), { type: "particle" })).toEqual(done("particle"));
  });

  it("extracts an undefined value that is present", () => {
    const r = attempt(new Key("x"), { x: undefined });
    expect(r).toEqual(done(undefined));
  });

  it("fails on a missing key", () => {
    expect(attempt(new Key("type"), { kind: "particle" })).toBe(NO_MATCH);
  });

  it("fails on values that are not subscriptable", () => {
    expect(attempt(new Key("type"), 42)).toBe(NO_MATCH);
    expect(attempt(new Key("type"), null)).toBe(NO_MATCH);
    expect(attempt(new Key("type"), undefined)).toBe(NO_MATCH);
  });

  it("indexes arrays and strings, negatives from the end", () => {
    expect(attempt(new Key(0), ["a", "b"])).toEqual(done("a"));
    expect(attempt(new Key(-1), ["a", "b"])).toEqual(done("b"));
    expect(attempt(new Key(2), ["a", "b"])).toBe(NO_MATCH);
    expect(attempt(new Key(1), "xy")).toEqual(done("y"));
    expect(attempt(new Key("length"), ["a"])).toBe(NO_MATCH);
  });

  it("looks up Map entries by key", () => {
    const key = { id: 1 };
    const m = new Map<unknown, string>([[key, "found"]]);
    expect(attempt(new Key(key), m)).toEqual(done("found"));
    expect(attempt(new Key({ id: 1 }), m)).toBe(NO_MATCH);
  });

  it("turns a throwing getter into a failure", () => {
    const obj = {
      get broken(): number {
        throw new Error("boom");
      },
    };
    expect(attempt(new Key("broken"), obj)).toEqual({ tag: "Fail", reason: "boom" });
  });

  it("turns a throwing has trap into a failure", () => {
    const guarded = new Proxy({}, {
      has() {
        throw new Error("has trap");
      },
    });
    expect(attempt(new Key("a"), guarded)).toEqual({ tag: "Fail", reason: "has trap" });
  });

  it("turns a throwing Map.has into a failure", () => {
    class SealedMap extends Map<unknown, unknown> {
      has(): boolean {
        throw new Error("sealed");
      }
    }
    expect(attempt(new Key("a"), new SealedMap())).toEqual({ tag: "Fail", reason: "sealed" });
  });

  it("fails on a revoked proxy", () => {
    const { proxy, revoke } = Proxy.revocable({ a: 1 }, {});
    revoke();
    expect(attempt(new Key("a"), proxy).tag).toBe("Fail");
  });
});

describe("Keys", () => {
  it("returns the tuple of values", () => {
    expect(attempt(new Keys("x", "y"), { x: 1, y: 2, z: 3 })).toEqual(done([1, 2]));
  });

  it("fails if any key is absent", () => {
    expect(attempt(new Keys("x", "w"), { x: 1 })).toBe(NO_MATCH);
  });
});

describe("Attr / Attrs", () => {
  it("reads named fields, inherited ones included", () => {
    class Point {
      constructor(readonly x: number, readonly y: number) {}
      get norm1(): number {
        return Math.abs(this.x) + Math.abs(this.y);
      }
    }
    const p = new Point(3, -4);
    expect(attempt(new Attr("x"), p)).toEqual(done(3));
    expect(attempt(new Attr("norm1"), p)).toEqual(done(7));
    expect(attempt(new Attrs("x", "y"), p)).toEqual(done([3, -4]));
  });

  it("reads fields of primitives", () => {
    expect(attempt(new Attr("length"), "abc")).toEqual(done(3));
  });

  it("fails on missing fields and nullish values", () => {
    expect(attempt(new Attr("z"), { x: 1 })).toBe(NO_MATCH);
    expect(attempt(new Attr("x"), null)).toBe(NO_MATCH);
    expect(attempt(new Attrs("x", "z"), { x: 1 })).toBe(NO_MATCH);
  });

  it("fails on a revoked proxy", () => {
    const { proxy, revoke } = Proxy.revocable({ x: 1 }, {});
    revoke();
    expect(attempt(new Attr("x"), proxy)).toEqual({
      tag: "Fail",
      reason: "Cannot perform 'has' on a proxy that has been revoked",
    });
  });
});
