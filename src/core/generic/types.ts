// src/core/generic/types.ts
// Generic function types: spec tokens, keyword arguments, method entries, candidates

import type { Diagnostic } from "../../outcome/diagnostic";
import type { Pattern } from "../pattern/types";

// ─────────────────────────────────────────────────────────────────
// Spec Tokens and Pattern Constructors
// ─────────────────────────────────────────────────────────────────

/**
 * SpecToken: the raw value given at registration for one argument
 * (a type name, a class, a tag string, a Pattern...). Its meaning is
 * decided entirely by the pattern constructor.
 */
export type SpecToken = unknown;

export type KeywordSpecs = Readonly<Record<string, SpecToken>>;

/**
 * PatternConstructor: turns a spec token into a Pattern.
 */
export type PatternConstructor = (token: SpecToken) => Pattern;

/**
 * DeclaringCallable: computes a pattern constructor from the actual call.
 * Returning nothing selects the identity constructor.
 */
export type DeclaringCallable = (
  args: readonly unknown[],
  kwargs: KeywordMap
) => PatternConstructor | undefined | void;

/**
 * PatternSource: where a generic function gets its constructor from.
 */
export type PatternSource =
  | { tag: "static"; construct: PatternConstructor }
  | { tag: "dynamic"; source: DeclaringCallable };

// ─────────────────────────────────────────────────────────────────
// Keyword Arguments
// ─────────────────────────────────────────────────────────────────

export type KeywordMap = Readonly<Record<string, unknown>>;

/**
 * Keywords: wrapper marking the trailing argument of a call as its
 * keyword arguments. Implementations receive theirs the same way.
 */
export class Keywords {
  constructor(readonly values: KeywordMap) {}

  get(name: string): unknown {
    return this.values[name];
  }
}

export function kw(values: Record<string, unknown>): Keywords {
  return new Keywords({ ...values });
}

/**
 * Split a raw argument list into positional and keyword arguments.
 */
export function splitKeywords(raw: readonly unknown[]): { args: unknown[]; kwargs: KeywordMap } {
  const last = raw[raw.length - 1];
  if (last instanceof Keywords) {
    return { args: raw.slice(0, -1), kwargs: last.values };
  }
  return { args: [...raw], kwargs: {} };
}

// ─────────────────────────────────────────────────────────────────
// Implementations and Method Entries
// ─────────────────────────────────────────────────────────────────

/**
 * Implementation: a method body. Parameters are checked bivariantly so
 * `(x: number, y: number) => number` can be registered.
 */
export type Implementation<R> = {
  bivarianceHack(...args: unknown[]): R;
}["bivarianceHack"];

/**
 * DispatchKey: canonical string for a spec tuple plus sorted keyword specs.
 */
export type DispatchKey = string;

/**
 * MethodEntry: a registered method.
 */
export type MethodEntry<R> = {
  /** Canonical key of the spec tuple */
  readonly key: DispatchKey;
  /** Positional spec tokens */
  readonly specs: readonly SpecToken[];
  /** Keyword spec tokens */
  readonly kwspecs: KeywordSpecs;
  /** The implementation */
  readonly method: Implementation<R>;
  /** Position in dispatch order (stable across replacement) */
  readonly index: number;
  /** Time of first registration */
  readonly registeredAt: number;
  /** Time of the last replacement, if any */
  readonly replacedAt?: number;
};

/**
 * Candidate: an entry whose patterns all matched, with the arguments the
 * patterns derived. Lives for one call.
 */
export type Candidate<R> = {
  readonly entry: MethodEntry<R>;
  readonly method: Implementation<R>;
  readonly args: readonly unknown[];
  readonly kwargs: KeywordMap;
};

/**
 * CallSite: what a combiner needs to report a failed call.
 */
export type CallSite = {
  name: string;
  args: readonly unknown[];
  kwargs: KeywordMap;
  previewDepth?: number;
  /** Record ledger events for this call */
  trace?: boolean;
  maxEvents?: number;
};

// ─────────────────────────────────────────────────────────────────
// Dispatch Keys
// ─────────────────────────────────────────────────────────────────

const objectIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();
let nextTokenId = 0;

function identityOf<K>(table: { get(k: K): number | undefined; set(k: K, v: number): unknown }, k: K): number {
  let id = table.get(k);
  if (id === undefined) {
    id = nextTokenId++;
    table.set(k, id);
  }
  return id;
}

/**
 * Key fragment for one token. Primitives are keyed by value (0 and -0
 * collide, as do NaNs); objects, functions and symbols by identity.
 */
export function tokenKey(token: SpecToken): string {
  switch (typeof token) {
    case "string":
      return `s${JSON.stringify(token)}`;
    case "number":
      return `n${String(token)}`;
    case "bigint":
      return `b${token.toString()}`;
    case "boolean":
      return token ? "T" : "F";
    case "undefined":
      return "u";
    case "symbol":
      return `y${identityOf(symbolIds, token)}`;
    case "object":
      return token === null ? "z" : `o${identityOf(objectIds, token)}`;
    case "function":
      return `o${identityOf(objectIds, token)}`;
  }
  return "?";
}

export function dispatchKey(specs: readonly SpecToken[], kwspecs: KeywordSpecs = {}): DispatchKey {
  const positional = specs.map(tokenKey).join(",");
  const keyword = Object.keys(kwspecs)
    .sort()
    .map(name => `${JSON.stringify(name)}=${tokenKey(kwspecs[name])}`)
    .join(",");
  return `${positional}|${keyword}`;
}

// ─────────────────────────────────────────────────────────────────
// Event Types (for ledger)
// ─────────────────────────────────────────────────────────────────

/**
 * GenericEvent: Events for the generic function ledger.
 */
export type GenericEvent =
  | { tag: "register"; name: string; key: DispatchKey; index: number; timestamp: number }
  | { tag: "replace"; name: string; key: DispatchKey; index: number; timestamp: number }
  | { tag: "dispatch"; name: string; arity: number; keywords: string[]; entries: number; timestamp: number }
  | {
      tag: "candidate";
      name: string;
      key: DispatchKey;
      index: number;
      skippedSpecs: number;
      /** Set when the call was shorter than the entry's specs */
      warning?: Diagnostic;
      timestamp: number;
    }
  | { tag: "miss"; name: string; arity: number; combiner: string; timestamp: number };
