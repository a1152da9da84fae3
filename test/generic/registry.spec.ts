// test/generic/registry.spec.ts
// Insertion-ordered method table and dispatch keys

import { describe, it, expect, beforeEach } from "vitest";
import { MethodRegistry, clearEventLog, countEvents, getRecentEvents, logGenericEvent } from "../../src/core/generic/registry";
import { dispatchKey, tokenKey } from "../../src/core/generic/types";

describe("dispatchKey", () => {
  it("keys primitives by value", () => {
    expect(dispatchKey(["integer", 1])).toBe(dispatchKey(["integer", 1]));
    expect(dispatchKey(["1"])).not.toBe(dispatchKey([1]));
    expect(tokenKey(0)).toBe(tokenKey(-0));
    expect(tokenKey(NaN)).toBe(tokenKey(NaN));
  });

  it("keys objects and functions by identity", () => {
    class A {}
    const spec = { kind: "x" };
    expect(dispatchKey([A])).toBe(dispatchKey([A]));
    expect(dispatchKey([spec])).toBe(dispatchKey([spec]));
    expect(dispatchKey([{ kind: "x" }])).not.toBe(dispatchKey([spec]));
  });

  it("sorts keyword specs by name", () => {
    expect(dispatchKey([], { b: 1, a: 2 })).toBe(dispatchKey([], { a: 2, b: 1 }));
    expect(dispatchKey(["x"], {})).not.toBe(dispatchKey([], { 0: "x" }));
  });
});

describe("MethodRegistry", () => {
  it("iterates in first-insertion order", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "a");
    reg.register(["b"], {}, () => "b");
    reg.register(["c"], {}, () => "c");
    expect(reg.snapshot().map(e => e.method())).toEqual(["a", "b", "c"]);
    expect(reg.snapshot().map(e => e.index)).toEqual([0, 1, 2]);
    expect(reg.size).toBe(3);
  });

  it("replaces in place without reordering", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "a1");
    reg.register(["b"], {}, () => "b");
    const { replaced, entry } = reg.register(["a"], {}, () => "a2");
    expect(replaced).toBe(true);
    expect(entry.index).toBe(0);
    expect(entry.replacedAt).toBeTypeOf("number");
    expect(reg.snapshot().map(e => e.method())).toEqual(["a2", "b"]);
    expect(reg.size).toBe(2);
  });

  it("looks up by exact key only", () => {
    const reg = new MethodRegistry<number>();
    const impl = () => 1;
    reg.register(["integer", "integer"], {}, impl);
    expect(reg.lookup(["integer", "integer"])).toBe(impl);
    expect(reg.lookup(["integer"])).toBeUndefined();
    expect(reg.has(["integer", "integer"])).toBe(true);
    expect(reg.has(["integer", "integer"], { y: "integer" })).toBe(false);
  });

  it("keeps an earlier snapshot stable across writes", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "a1");
    const before = reg.snapshot();
    reg.register(["b"], {}, () => "b");
    reg.register(["a"], {}, () => "a2");
    expect(before.length).toBe(1);
    expect(before[0].method()).toBe("a1");
    expect(reg.snapshot().length).toBe(2);
  });

  it("copies the spec arrays it stores", () => {
    const reg = new MethodRegistry<string>();
    const specs = ["a"];
    const kwspecs: Record<string, string> = { k: "v" };
    reg.register(specs, kwspecs, () => "x");
    specs.push("b");
    kwspecs.extra = "w";
    expect(reg.snapshot()[0].specs).toEqual(["a"]);
    expect(reg.snapshot()[0].kwspecs).toEqual({ k: "v" });
  });

  it("hands out frozen entries that cannot be rewired", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "original");
    const [entry] = reg.snapshot();
    expect(Object.isFrozen(reg.snapshot())).toBe(true);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.specs)).toBe(true);
    expect(Reflect.set(entry, "method", () => "rewired")).toBe(false);
    expect(reg.lookup(["a"])?.()).toBe("original");
  });
});

describe("event ledger", () => {
  beforeEach(() => {
    clearEventLog();
  });

  it("records and counts events", () => {
    logGenericEvent({ tag: "register", name: "f", key: "k", index: 0, timestamp: 1 });
    logGenericEvent({ tag: "miss", name: "f", arity: 1, combiner: "applyFirst", timestamp: 2 });
    expect(countEvents("register")).toBe(1);
    expect(countEvents("miss")).toBe(1);
    expect(getRecentEvents(1)).toEqual([{ tag: "miss", name: "f", arity: 1, combiner: "applyFirst", timestamp: 2 }]);
  });

  it("drops the oldest events past the limit", () => {
    for (let i = 0; i < 5; i++) {
      logGenericEvent({ tag: "register", name: "f", key: `k${i}`, index: i, timestamp: i }, 3);
    }
    const events = getRecentEvents();
    expect(events.length).toBe(3);
    expect(events[0]).toMatchObject({ key: "k2" });
  });
});
