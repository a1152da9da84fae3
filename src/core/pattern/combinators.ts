// src/core/pattern/combinators.ts
// Structural composition of patterns, written only against Pattern.attempt

import type { Outcome } from "../../outcome/outcome";
import { isDone, isFail } from "../../outcome/outcome";
import { done } from "../../outcome/constructors";
import type { Pattern, WithMatch } from "./types";
import { BasePattern, isMatch } from "./pattern";
import { Predicate } from "./predicate";

function describeAll(name: string, patterns: readonly Pattern[]): string {
  return `${name}(${patterns.map(p => p.describe()).join(", ")})`;
}

// ─────────────────────────────────────────────────────────────────
// Boolean combinators (return the original value)
// ─────────────────────────────────────────────────────────────────

/** Every subpattern matches. Empty All is vacuously true. */
export class All extends Predicate<unknown> {
  readonly patterns: readonly Pattern[];

  constructor(...patterns: Pattern[]) {
    super();
    this.patterns = patterns;
  }

  protected test(value: unknown): value is unknown {
    return this.patterns.every(p => isMatch(value, p));
  }

  describe(): string {
    return describeAll("All", this.patterns);
  }
}

/** At least one subpattern matches. Empty Any is false. */
export class Any extends Predicate<unknown> {
  readonly patterns: readonly Pattern[];

  constructor(...patterns: Pattern[]) {
    super();
    this.patterns = patterns;
  }

  protected test(value: unknown): value is unknown {
    return this.patterns.some(p => isMatch(value, p));
  }

  describe(): string {
    return describeAll("Any", this.patterns);
  }
}

/** Exactly one subpattern matches. */
export class OneOf extends Predicate<unknown> {
  readonly patterns: readonly Pattern[];

  constructor(...patterns: Pattern[]) {
    super();
    this.patterns = patterns;
  }

  protected test(value: unknown): value is unknown {
    let matched = 0;
    for (const p of this.patterns) {
      if (isMatch(value, p) && ++matched > 1) return false;
    }
    return matched === 1;
  }

  describe(): string {
    return describeAll("OneOf", this.patterns);
  }
}

export class Not extends Predicate<unknown> {
  constructor(readonly pattern: Pattern) {
    super();
  }

  protected test(value: unknown): value is unknown {
    return !isMatch(value, this.pattern);
  }

  describe(): string {
    return `Not(${this.pattern.describe()})`;
  }
}

export class AsPredicate extends Predicate<unknown> {
  constructor(readonly pattern: Pattern) {
    super();
  }

  protected test(value: unknown): value is unknown {
    return isMatch(value, this.pattern);
  }

  describe(): string {
    return `AsPredicate(${this.pattern.describe()})`;
  }
}

// ─────────────────────────────────────────────────────────────────
// Value-deriving combinators
// ─────────────────────────────────────────────────────────────────

/**
 * Right-to-left pipeline: `Compose(f, g)` applies `g` first and feeds its
 * derived value to `f`. Stops at the first failing stage.
 */
export class Compose extends BasePattern<unknown> {
  readonly patterns: readonly Pattern[];

  constructor(...patterns: Pattern[]) {
    super();
    this.patterns = patterns;
  }

  attempt(value: unknown): Outcome<unknown> {
    let current: unknown = value;
    for (let i = this.patterns.length - 1; i >= 0; i--) {
      const r = this.patterns[i].attempt(current);
      if (isFail(r)) return r;
      current = r.value;
    }
    return done(current);
  }

  describe(): string {
    return describeAll("Compose", this.patterns);
  }
}

/** Every pattern applied to the same input; the tuple of their results. */
export class Many extends BasePattern<readonly unknown[]> {
  readonly patterns: readonly Pattern[];

  constructor(...patterns: Pattern[]) {
    super();
    this.patterns = patterns;
  }

  attempt(value: unknown): Outcome<readonly unknown[]> {
    const results: unknown[] = [];
    for (const p of this.patterns) {
      const r = p.attempt(value);
      if (isFail(r)) return r;
      results.push(r.value);
    }
    return done(results);
  }

  describe(): string {
    return describeAll("Many", this.patterns);
  }
}

export class With<T> extends BasePattern<WithMatch<T>> {
  constructor(readonly pattern: Pattern<T>) {
    super();
  }

  attempt(value: unknown): Outcome<WithMatch<T>> {
    const r = this.pattern.attempt(value);
    return isDone(r) ? done({ value, match: r.value }) : r;
  }

  describe(): string {
    return `With(${this.pattern.describe()})`;
  }
}

class IgnorePattern extends BasePattern<undefined> {
  attempt(): Outcome<undefined> {
    return done(undefined);
  }

  describe(): string {
    return "Ignore";
  }
}

/** Wildcard: matches anything, derives `undefined`. */
export const Ignore: Pattern<undefined> = new IgnorePattern();
