// test/generic/dispatch.spec.ts
// Constructor resolution, entry matching and lazy candidate production

import { describe, it, expect, beforeEach } from "vitest";
import { DEFAULT_CONFIG, type DispatchConfig } from "../../src/core/config/config";
import { done } from "../../src/outcome/constructors";
import { pattern } from "../../src/core/pattern/pattern";
import { Equal } from "../../src/core/pattern/predicate";
import { Key } from "../../src/core/pattern/access";
import { Compose } from "../../src/core/pattern/combinators";
import {
  dispatch,
  keyDispatch,
  matchEntry,
  patternIdentity,
  resolvePatternConstructor,
  typeDispatch,
  type DispatchTarget,
} from "../../src/core/generic/dispatch";
import { DispatchError } from "../../src/core/generic/errors";
import { MethodRegistry, clearEventLog, countEvents, getRecentEvents } from "../../src/core/generic/registry";
import type { CallSite, PatternConstructor } from "../../src/core/generic/types";

const lenient: DispatchConfig = { ...DEFAULT_CONFIG };
const strict: DispatchConfig = { ...DEFAULT_CONFIG, arityPolicy: "strict" };

function call(args: unknown[], kwargs: Record<string, unknown> = {}): CallSite {
  return { name: "f", args, kwargs };
}

function target<R>(registry: MethodRegistry<R>, construct: PatternConstructor = typeDispatch): DispatchTarget<R> {
  return { name: "f", registry, source: { tag: "static", construct } };
}

describe("built-in constructors", () => {
  it("patternIdentity passes patterns through and compares other tokens", () => {
    const p = new Key("a");
    expect(patternIdentity(p)).toBe(p);
    expect(patternIdentity("x")).toBeInstanceOf(Equal);
  });

  it("typeDispatch builds Type patterns", () => {
    expect(typeDispatch("integer").attempt(3)).toEqual(done(3));
    expect(typeDispatch(Array).attempt("no").tag).toBe("Fail");
    expect(() => typeDispatch(42)).toThrow(TypeError);
  });

  it("keyDispatch gates on a key without transforming the argument", () => {
    const byType = keyDispatch("type");
    const value = { type: "person", what: "hi" };
    expect(byType("person").attempt(value)).toEqual(done(value));
    expect(byType("robot").attempt(value).tag).toBe("Fail");
    expect(byType("person").attempt("not an object").tag).toBe("Fail");
  });
});

describe("resolvePatternConstructor", () => {
  it("returns the static constructor", () => {
    expect(resolvePatternConstructor({ tag: "static", construct: typeDispatch }, call([1]))).toBe(typeDispatch);
  });

  it("invokes the declaring callable with the call's arguments", () => {
    const seen: unknown[] = [];
    const construct = resolvePatternConstructor(
      {
        tag: "dynamic",
        source: (args, kwargs) => {
          seen.push(args, kwargs);
          return typeDispatch;
        },
      },
      call([1, "a"], { k: true })
    );
    expect(construct).toBe(typeDispatch);
    expect(seen).toEqual([[1, "a"], { k: true }]);
  });

  it("falls back to the identity constructor", () => {
    expect(resolvePatternConstructor({ tag: "dynamic", source: () => undefined }, call([]))).toBe(patternIdentity);
  });

  it("rejects a declaring callable that returns a non-function", () => {
    const returnsObject = () => JSON.parse("{}");
    expect(() => resolvePatternConstructor({ tag: "dynamic", source: returnsObject }, call([]))).toThrow(DispatchError);
  });
});

describe("matchEntry", () => {
  const registry = new MethodRegistry<string>();
  const { entry } = registry.register(["integer", "string"], {}, () => "m");

  it("replaces each argument by its derived value", () => {
    const construct: PatternConstructor = token => new Compose(typeDispatch(token), new Key("v"));
    const m = matchEntry(entry, construct, call([{ v: 1 }, { v: "s" }]), lenient);
    expect(m?.args).toEqual([1, "s"]);
  });

  it("passes surplus arguments through", () => {
    const m = matchEntry(entry, typeDispatch, call([1, "a", { extra: true }, null]), lenient);
    expect(m?.args).toEqual([1, "a", { extra: true }, null]);
    expect(m?.skippedSpecs).toBe(0);
  });

  it("skips trailing specs on short calls under the lenient policy", () => {
    const m = matchEntry(entry, typeDispatch, call([1]), lenient);
    expect(m?.args).toEqual([1]);
    expect(m?.skippedSpecs).toBe(1);
  });

  it("rejects short calls under the strict policy", () => {
    expect(matchEntry(entry, typeDispatch, call([1]), strict)).toBeUndefined();
  });

  it("fails when any positional pattern fails", () => {
    expect(matchEntry(entry, typeDispatch, call([1, 2]), lenient)).toBeUndefined();
  });

  it("requires keyword arguments named by keyword specs", () => {
    const reg = new MethodRegistry<string>();
    const { entry: kwEntry } = reg.register([], { scale: "integer" }, () => "k");
    expect(matchEntry(kwEntry, typeDispatch, call([]), lenient)).toBeUndefined();
    expect(matchEntry(kwEntry, typeDispatch, call([], { scale: 1.5 }), lenient)).toBeUndefined();
    const m = matchEntry(kwEntry, typeDispatch, call(["x"], { scale: 2, other: "o" }), lenient);
    expect(m?.kwargs).toEqual({ scale: 2, other: "o" });
    expect(m?.args).toEqual(["x"]);
  });

  it("wraps constructor errors in DispatchError", () => {
    const reg = new MethodRegistry<string>();
    const { entry: badEntry } = reg.register([42], {}, () => "bad");
    try {
      matchEntry(badEntry, typeDispatch, call([1]), lenient);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DispatchError);
      if (e instanceof DispatchError) {
        expect(e.failure.reason).toBe("invalid-spec");
        expect(e.failure.diagnostics[0].code).toBe("M0002");
        expect(e.cause).toBeInstanceOf(TypeError);
      }
    }
  });
});

describe("dispatch", () => {
  beforeEach(() => {
    clearEventLog();
  });

  it("yields candidates in registry order", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["number"], {}, () => "number");
    reg.register(["string"], {}, () => "string");
    reg.register(["integer"], {}, () => "integer");
    const names = [...dispatch(target(reg), [3], {}, lenient)].map(c => c.method());
    expect(names).toEqual(["number", "integer"]);
  });

  it("is lazy: later entries are not evaluated when the consumer stops", () => {
    const tried: string[] = [];
    const spying: PatternConstructor = token =>
      pattern(v => {
        tried.push(String(token));
        return done(v);
      }, String(token));
    const reg = new MethodRegistry<string>();
    reg.register(["first"], {}, () => "1");
    reg.register(["second"], {}, () => "2");

    const candidates = dispatch(target(reg, spying), ["x"], {}, lenient);
    expect(tried).toEqual([]);
    const first = candidates.next();
    expect(first.done).toBe(false);
    expect(tried).toEqual(["first"]);
  });

  it("calls a dynamic source once per call", () => {
    let calls = 0;
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "a");
    reg.register(["b"], {}, () => "b");
    const t: DispatchTarget<string> = {
      name: "f",
      registry: reg,
      source: {
        tag: "dynamic",
        source: () => {
          calls++;
          return token => new Equal(token);
        },
      },
    };
    expect([...dispatch(t, ["b"], {}, lenient)].map(c => c.method())).toEqual(["b"]);
    expect(calls).toBe(1);
  });

  it("builds patterns fresh on every call", () => {
    let built = 0;
    const counting: PatternConstructor = token => {
      built++;
      return new Equal(token);
    };
    const reg = new MethodRegistry<string>();
    reg.register(["a"], {}, () => "a");
    [...dispatch(target(reg, counting), ["a"], {}, lenient)];
    [...dispatch(target(reg, counting), ["a"], {}, lenient)];
    expect(built).toBe(2);
  });

  it("records ledger events when tracing", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["integer"], {}, () => "i");
    reg.register(["string"], {}, () => "s");
    [...dispatch(target(reg), [1], {}, { ...lenient, trace: true })];
    expect(countEvents("dispatch")).toBe(1);
    expect(countEvents("candidate")).toBe(1);
    expect(getRecentEvents(1)[0]).toMatchObject({ tag: "candidate", name: "f", index: 0, skippedSpecs: 0 });
  });

  it("warns on candidates that skipped trailing specs", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["integer", "integer"], {}, () => "ii");
    [...dispatch(target(reg), [1], {}, { ...lenient, trace: true })];
    const [event] = getRecentEvents(1);
    expect(event.tag).toBe("candidate");
    if (event.tag === "candidate") {
      expect(event.skippedSpecs).toBe(1);
      expect(event.warning?.code).toBe("W0001");
      expect(event.warning?.message).toBe("Call supplies 1 argument(s) for 2 spec(s)");
    }
  });

  it("records nothing when not tracing", () => {
    const reg = new MethodRegistry<string>();
    reg.register(["integer"], {}, () => "i");
    [...dispatch(target(reg), [1], {}, lenient)];
    expect(getRecentEvents()).toEqual([]);
  });
});
