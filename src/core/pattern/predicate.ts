// src/core/pattern/predicate.ts
// Boolean-gated patterns: return the input unchanged on success

import type { Outcome } from "../../outcome/outcome";
import { done, NO_MATCH } from "../../outcome/constructors";
import { previewValue } from "../../outcome/preview";
import { BasePattern } from "./pattern";

export abstract class Predicate<T = unknown> extends BasePattern<T> {
  protected abstract test(value: unknown): value is T;

  attempt(value: unknown): Outcome<T> {
    return this.test(value) ? done(value) : NO_MATCH;
  }
}

class FnPredicate<T> extends Predicate<T> {
  constructor(
    private readonly check: (value: unknown) => value is T,
    private readonly label: string
  ) {
    super();
  }

  protected test(value: unknown): value is T {
    return this.check(value);
  }

  describe(): string {
    return this.label;
  }
}

export function predicate<T>(test: (value: unknown) => value is T, label?: string): Predicate<T>;
export function predicate(test: (value: unknown) => boolean, label?: string): Predicate<unknown>;
export function predicate(test: (value: unknown) => boolean, label = "predicate"): Predicate<unknown> {
  return new FnPredicate((value): value is unknown => test(value), label);
}

// ─────────────────────────────────────────────────────────────────
// Equality, identity, membership
// ─────────────────────────────────────────────────────────────────

/** SameValueZero: `===` except that NaN equals NaN. */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

export class Equal<T> extends Predicate<T> {
  constructor(readonly expected: T) {
    super();
  }

  protected test(value: unknown): value is T {
    return sameValueZero(value, this.expected);
  }

  describe(): string {
    return `Equal(${previewValue(this.expected)})`;
  }
}

export class Is<T> extends Predicate<T> {
  constructor(readonly identity: T) {
    super();
  }

  protected test(value: unknown): value is T {
    return Object.is(value, this.identity);
  }

  describe(): string {
    return `Is(${previewValue(this.identity)})`;
  }
}

function isIterable(x: object): x is Iterable<unknown> {
  return Symbol.iterator in x && typeof x[Symbol.iterator] === "function";
}

/**
 * Membership: array elements, Set members, Map keys, substrings of a
 * string, own keys of a plain object, or elements of any other iterable.
 */
export class In extends Predicate<unknown> {
  constructor(readonly container: unknown) {
    super();
  }

  protected test(value: unknown): value is unknown {
    const c = this.container;
    if (Array.isArray(c)) return c.some(item => sameValueZero(item, value));
    if (c instanceof Set || c instanceof Map) return c.has(value);
    if (typeof c === "string") return typeof value === "string" && c.includes(value);
    if (typeof c !== "object" || c === null) return false;
    if (isIterable(c)) {
      for (const item of c) {
        if (sameValueZero(item, value)) return true;
      }
      return false;
    }
    return (typeof value === "string" || typeof value === "symbol") && Object.hasOwn(c, value);
  }

  describe(): string {
    return `In(${previewValue(this.container, 1)})`;
  }
}

// ─────────────────────────────────────────────────────────────────
// Runtime types
// ─────────────────────────────────────────────────────────────────

export type TypeName =
  | "number"
  | "integer"
  | "float"
  | "string"
  | "boolean"
  | "bigint"
  | "symbol"
  | "function"
  | "object"
  | "array"
  | "null"
  | "undefined";

export type Constructor = abstract new (...args: never[]) => unknown;

export type TypeToken = TypeName | Constructor;

const TYPE_NAMES: ReadonlySet<string> = new Set<TypeName>([
  "number", "integer", "float", "string", "boolean", "bigint",
  "symbol", "function", "object", "array", "null", "undefined",
]);

export function isTypeName(x: unknown): x is TypeName {
  return typeof x === "string" && TYPE_NAMES.has(x);
}

export function isTypeToken(x: unknown): x is TypeToken {
  return isTypeName(x) || typeof x === "function";
}

export function hasRuntimeType(value: unknown, name: TypeName): boolean {
  switch (name) {
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number" && !Number.isInteger(value);
    case "array":
      return Array.isArray(value);
    case "null":
      return value === null;
    case "object":
      return typeof value === "object" && value !== null;
    default:
      return typeof value === name;
  }
}

/**
 * The wrapper constructors stand for the primitive kinds they box, so
 * `Type(Number)` accepts `1` and `Type(String)` accepts `"a"`.
 */
const PRIMITIVE_CONSTRUCTORS = new Map<unknown, TypeName>([
  [Number, "number"],
  [String, "string"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
  [Function, "function"],
  [Array, "array"],
]);

export function typeName(value: unknown): TypeName {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float";
  return typeof value;
}

function instanceOf(value: unknown, ctor: Constructor): boolean {
  try {
    return value instanceof ctor;
  } catch {
    // a throwing Symbol.hasInstance
    return false;
  }
}

export class Type extends Predicate<unknown> {
  /**
   * @throws TypeError for a function that cannot be used with `instanceof`
   * (arrow functions, methods)
   */
  constructor(readonly type: TypeToken) {
    super();
    if (typeof type === "function" && !PRIMITIVE_CONSTRUCTORS.has(type)) {
      const proto: unknown = type.prototype;
      if ((typeof proto !== "object" || proto === null) && !Object.hasOwn(type, Symbol.hasInstance)) {
        throw new TypeError(`Type: ${type.name || "anonymous function"} is not a class`);
      }
    }
  }

  protected test(value: unknown): value is unknown {
    const t = this.type;
    if (typeof t === "string") return hasRuntimeType(value, t);
    const primitive = PRIMITIVE_CONSTRUCTORS.get(t);
    if (primitive !== undefined) {
      return hasRuntimeType(value, primitive) || instanceOf(value, t);
    }
    if (t === Object) {
      return (typeof value === "object" && value !== null) || typeof value === "function";
    }
    return instanceOf(value, t);
  }

  describe(): string {
    return `Type(${typeof this.type === "string" ? this.type : this.type.name || "anonymous"})`;
  }
}
