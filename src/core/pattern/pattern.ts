// src/core/pattern/pattern.ts
// Base class, free-function API and ad-hoc pattern builders

import type { Outcome } from "../../outcome/outcome";
import { isDone } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import { MatchError } from "../../outcome/errors";
import type { Pattern } from "./types";

export abstract class BasePattern<T> implements Pattern<T> {
  abstract attempt(value: unknown): Outcome<T>;
  abstract describe(): string;

  toString(): string {
    return this.describe();
  }
}

// ─────────────────────────────────────────────────────────────────
// Free-function API
// ─────────────────────────────────────────────────────────────────

export function attempt<T>(pattern: Pattern<T>, value: unknown): Outcome<T> {
  return pattern.attempt(value);
}

/**
 * True if the pattern matches; the derived value is discarded.
 */
export function isMatch(value: unknown, pattern: Pattern): boolean {
  return isDone(pattern.attempt(value));
}

/**
 * Derived value of a successful match. Throws MatchError otherwise, so keep
 * it off the dispatch path.
 */
export function getMatch<T>(value: unknown, pattern: Pattern<T>): T {
  const outcome = pattern.attempt(value);
  if (isDone(outcome)) {
    return outcome.value;
  }
  throw new MatchError(value, outcome.reason ?? pattern.describe());
}

export function isPattern(x: unknown): x is Pattern {
  return (
    typeof x === "object" &&
    x !== null &&
    "attempt" in x &&
    typeof x.attempt === "function" &&
    "describe" in x &&
    typeof x.describe === "function"
  );
}

// ─────────────────────────────────────────────────────────────────
// Ad-hoc patterns
// ─────────────────────────────────────────────────────────────────

class FnPattern<T> extends BasePattern<T> {
  constructor(
    private readonly fn: (value: unknown) => Outcome<T>,
    private readonly label: string
  ) {
    super();
  }

  attempt(value: unknown): Outcome<T> {
    return this.fn(value);
  }

  describe(): string {
    return this.label;
  }
}

/**
 * Build a pattern from a function that already speaks Outcome.
 */
export function pattern<T>(fn: (value: unknown) => Outcome<T>, label = "pattern"): Pattern<T> {
  return new FnPattern(fn, label);
}

/**
 * Build a pattern from a plain extractor. Anything the extractor throws is
 * turned into a match failure.
 */
export function guarded<T>(extract: (value: unknown) => T, label = "guarded"): Pattern<T> {
  return new FnPattern<T>(value => {
    try {
      return done(extract(value));
    } catch (e) {
      return fail(e instanceof Error ? e.message : String(e));
    }
  }, label);
}
