// src/core/pattern/types.ts
// The Pattern capability: inspect a value, derive a value or fail

import type { Outcome } from "../../outcome/outcome";

/**
 * Pattern: anything that can attempt a match against a value.
 *
 * `attempt` never throws for an ordinary non-match; lookup errors on the
 * inspected value are reported as a `Fail` outcome.
 */
export interface Pattern<T = unknown> {
  attempt(value: unknown): Outcome<T>;
  describe(): string;
}

/** Value derived by a pattern on success. */
export type MatchedBy<P> = P extends Pattern<infer T> ? T : never;

/** Pair produced by `With`: the raw input alongside the submatch. */
export type WithMatch<T> = {
  readonly value: unknown;
  readonly match: T;
};
