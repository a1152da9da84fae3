// src/core/generic/dispatch.ts
// Dispatch engine: resolve the pattern constructor, match entries lazily

import type { DispatchConfig } from "../config/config";
import type { Pattern } from "../pattern/types";
import { isPattern } from "../pattern/pattern";
import { Equal, Type, isTypeToken } from "../pattern/predicate";
import { Key } from "../pattern/access";
import { AsPredicate, Compose } from "../pattern/combinators";
import { isFail } from "../../outcome/outcome";
import { makeDiagnostic } from "../../outcome/codes";
import { invalidConstructor, invalidSpec } from "./errors";
import { logGenericEvent } from "./registry";
import type { MethodRegistry } from "./registry";
import type {
  CallSite,
  Candidate,
  KeywordMap,
  MethodEntry,
  PatternConstructor,
  PatternSource,
  SpecToken,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Built-in Pattern Constructors
// ─────────────────────────────────────────────────────────────────

/**
 * Identity constructor: Pattern tokens are used as they are, any other token
 * is compared by value.
 */
export const patternIdentity: PatternConstructor = token =>
  isPattern(token) ? token : new Equal(token);

/**
 * Dispatch on runtime type: tokens are type names ("integer", "string"...)
 * or classes. Pattern tokens pass through.
 */
export const typeDispatch: PatternConstructor = token => {
  if (isPattern(token)) return token;
  if (isTypeToken(token)) return new Type(token);
  throw new TypeError(`not a type token: ${String(token)}`);
};

/**
 * Dispatch on the value stored under `key` in each argument. A Pattern token
 * is applied to that value; any other token must equal it. Methods still
 * receive the whole argument.
 */
export function keyDispatch(key: unknown): PatternConstructor {
  return token => new AsPredicate(new Compose(isPattern(token) ? token : new Equal(token), new Key(key)));
}

// ─────────────────────────────────────────────────────────────────
// Constructor Resolution
// ─────────────────────────────────────────────────────────────────

/**
 * Resolve the pattern constructor for one call. A dynamic source is invoked
 * with the call's arguments; if it returns nothing the identity constructor
 * is used.
 */
export function resolvePatternConstructor(
  source: PatternSource,
  call: CallSite
): PatternConstructor {
  if (source.tag === "static") {
    return source.construct;
  }
  const produced: unknown = source.source(call.args, call.kwargs);
  if (produced === undefined || produced === null) {
    return patternIdentity;
  }
  if (!isPatternConstructor(produced)) {
    throw invalidConstructor(call, produced);
  }
  return produced;
}

function isPatternConstructor(x: unknown): x is PatternConstructor {
  return typeof x === "function";
}

// ─────────────────────────────────────────────────────────────────
// Entry Matching
// ─────────────────────────────────────────────────────────────────

export type EntryMatch = {
  args: unknown[];
  kwargs: Record<string, unknown>;
  /** Trailing specs left unevaluated because the call was shorter */
  skippedSpecs: number;
};

function buildPattern(construct: PatternConstructor, token: SpecToken, call: CallSite): Pattern {
  let built: unknown;
  try {
    built = construct(token);
  } catch (e) {
    throw invalidSpec(call, token, e);
  }
  if (!isPattern(built)) {
    throw invalidSpec(call, token, new TypeError("constructor did not return a pattern"));
  }
  return built;
}

/**
 * Match one registry entry against a call.
 *
 * Positional specs pair with arguments by position; surplus arguments pass
 * through. Missing arguments skip the trailing specs under the lenient
 * arity policy and fail the entry under the strict one. A keyword spec
 * whose argument is absent fails the entry.
 */
export function matchEntry<R>(
  entry: MethodEntry<R>,
  construct: PatternConstructor,
  call: CallSite,
  config: Pick<DispatchConfig, "arityPolicy">
): EntryMatch | undefined {
  const skippedSpecs = Math.max(0, entry.specs.length - call.args.length);
  if (skippedSpecs > 0 && config.arityPolicy === "strict") {
    return undefined;
  }

  const args = [...call.args];
  const paired = Math.min(entry.specs.length, args.length);
  for (let i = 0; i < paired; i++) {
    const r = buildPattern(construct, entry.specs[i], call).attempt(args[i]);
    if (isFail(r)) return undefined;
    args[i] = r.value;
  }

  const kwargs: Record<string, unknown> = { ...call.kwargs };
  for (const [name, token] of Object.entries(entry.kwspecs)) {
    if (!Object.hasOwn(call.kwargs, name)) return undefined;
    const r = buildPattern(construct, token, call).attempt(call.kwargs[name]);
    if (isFail(r)) return undefined;
    kwargs[name] = r.value;
  }

  return { args, kwargs, skippedSpecs };
}

// ─────────────────────────────────────────────────────────────────
// Core Dispatch
// ─────────────────────────────────────────────────────────────────

export type DispatchTarget<R> = {
  name: string;
  registry: MethodRegistry<R>;
  source: PatternSource;
};

export function makeCallSite(
  name: string,
  args: readonly unknown[],
  kwargs: KeywordMap,
  config: DispatchConfig
): CallSite {
  return {
    name,
    args,
    kwargs,
    previewDepth: config.previewDepth,
    trace: config.trace,
    maxEvents: config.maxEvents,
  };
}

/**
 * Lazily yield the candidates for a call, in registry order.
 *
 * Nothing runs until the first candidate is requested; a consumer that
 * stops early never evaluates the remaining entries' patterns.
 */
export function* dispatch<R>(
  target: DispatchTarget<R>,
  args: readonly unknown[],
  kwargs: KeywordMap,
  config: DispatchConfig
): Generator<Candidate<R>, void, undefined> {
  const call = makeCallSite(target.name, args, kwargs, config);
  const construct = resolvePatternConstructor(target.source, call);
  const entries = target.registry.snapshot();

  if (config.trace) {
    logGenericEvent({
      tag: "dispatch",
      name: target.name,
      arity: args.length,
      keywords: Object.keys(kwargs),
      entries: entries.length,
      timestamp: Date.now(),
    }, config.maxEvents);
  }

  for (const entry of entries) {
    const m = matchEntry(entry, construct, call, config);
    if (!m) continue;

    if (config.trace) {
      logGenericEvent({
        tag: "candidate",
        name: target.name,
        key: entry.key,
        index: entry.index,
        skippedSpecs: m.skippedSpecs,
        warning: m.skippedSpecs > 0
          ? makeDiagnostic("W0001", { actual: args.length, expected: entry.specs.length })
          : undefined,
        timestamp: Date.now(),
      }, config.maxEvents);
    }

    yield { entry, method: entry.method, args: m.args, kwargs: m.kwargs };
  }
}
