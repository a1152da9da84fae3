// src/core/pattern/access.ts
// Subscript (Key/Keys) and named-field (Attr/Attrs) extraction

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, fail, NO_MATCH } from "../../outcome/constructors";
import { previewValue } from "../../outcome/preview";
import { BasePattern } from "./pattern";

// ─────────────────────────────────────────────────────────────────
// Lookup primitives
// ─────────────────────────────────────────────────────────────────

/**
 * Run a whole lookup, shape checks included. Proxy traps, getters and
 * `has` overrides may throw at any step; a throw is a non-match.
 */
function total(lookup: () => Outcome<unknown>): Outcome<unknown> {
  try {
    return lookup();
  } catch (e) {
    return fail(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Subscript lookup. Arrays and strings take integer indexes (negative ones
 * count from the end), Maps go through `get`, other objects through the
 * `in` operator. Anything else is not subscriptable.
 */
export function lookupKey(value: unknown, key: unknown): Outcome<unknown> {
  return total(() => {
    if (Array.isArray(value) || typeof value === "string") {
      if (typeof key !== "number" || !Number.isInteger(key)) return NO_MATCH;
      const index = key < 0 ? value.length + key : key;
      if (index < 0 || index >= value.length) return NO_MATCH;
      return done(value[index]);
    }
    if (value instanceof Map) {
      return value.has(key) ? done(value.get(key)) : NO_MATCH;
    }
    if (typeof value !== "object" || value === null) return NO_MATCH;
    if (typeof key !== "string" && typeof key !== "number" && typeof key !== "symbol") return NO_MATCH;
    if (!(key in value)) return NO_MATCH;
    return done(Reflect.get(value, key));
  });
}

/**
 * Named-field lookup on any non-nullish value, primitives included
 * (`"abc".length`). Getters that throw count as a non-match.
 */
export function lookupAttr(value: unknown, name: string | symbol): Outcome<unknown> {
  if (value === null || value === undefined) return NO_MATCH;
  return total(() => {
    const target: object = Object(value);
    if (!(name in target)) return NO_MATCH;
    return done(Reflect.get(target, name));
  });
}

function lookupAll<K>(
  value: unknown,
  keys: readonly K[],
  lookup: (value: unknown, key: K) => Outcome<unknown>
): Outcome<readonly unknown[]> {
  const found: unknown[] = [];
  for (const k of keys) {
    const r = lookup(value, k);
    if (isFail(r)) return r;
    found.push(r.value);
  }
  return done(found);
}

// ─────────────────────────────────────────────────────────────────
// Patterns
// ─────────────────────────────────────────────────────────────────

export class Key extends BasePattern<unknown> {
  constructor(readonly key: unknown) {
    super();
  }

  attempt(value: unknown): Outcome<unknown> {
    return lookupKey(value, this.key);
  }

  describe(): string {
    return `Key(${previewValue(this.key)})`;
  }
}

export class Keys extends BasePattern<readonly unknown[]> {
  readonly keys: readonly unknown[];

  constructor(...keys: unknown[]) {
    super();
    this.keys = keys;
  }

  attempt(value: unknown): Outcome<readonly unknown[]> {
    return lookupAll(value, this.keys, lookupKey);
  }

  describe(): string {
    return `Keys(${this.keys.map(k => previewValue(k)).join(", ")})`;
  }
}

export class Attr extends BasePattern<unknown> {
  constructor(readonly attribute: string | symbol) {
    super();
  }

  attempt(value: unknown): Outcome<unknown> {
    return lookupAttr(value, this.attribute);
  }

  describe(): string {
    return `Attr(${String(this.attribute)})`;
  }
}

export class Attrs extends BasePattern<readonly unknown[]> {
  readonly attributes: ReadonlyArray<string | symbol>;

  constructor(...attributes: Array<string | symbol>) {
    super();
    this.attributes = attributes;
  }

  attempt(value: unknown): Outcome<readonly unknown[]> {
    return lookupAll(value, this.attributes, lookupAttr);
  }

  describe(): string {
    return `Attrs(${this.attributes.map(String).join(", ")})`;
  }
}
