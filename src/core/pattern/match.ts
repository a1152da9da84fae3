// src/core/pattern/match.ts
// Case selection over a single value: first arm whose pattern matches wins

import type { Outcome } from "../../outcome/outcome";
import { isDone } from "../../outcome/outcome";
import { done, NO_MATCH } from "../../outcome/constructors";
import { MatchError } from "../../outcome/errors";
import { makeDiagnostic } from "../../outcome/codes";
import { previewValue } from "../../outcome/preview";
import type { Pattern } from "./types";
import { Ignore } from "./combinators";

type Arm<R> = (value: unknown) => Outcome<R>;

/**
 * Immutable builder: every `case` returns a new Match. Arms are only run
 * when a result is requested.
 */
export class Match<R = never> {
  constructor(
    readonly value: unknown,
    private readonly arms: ReadonlyArray<Arm<R>> = []
  ) {}

  case<T, S>(pattern: Pattern<T>, handler: (matched: T) => S): Match<R | S> {
    const arm: Arm<S> = value => {
      const r = pattern.attempt(value);
      return isDone(r) ? done(handler(r.value)) : r;
    };
    return this.append(arm);
  }

  /** Catch-all arm. */
  ignore<S>(handler: () => S): Match<R | S> {
    return this.case(Ignore, () => handler());
  }

  /**
   * Nested cases on the same value. If none of them applies the outer
   * match carries on with its next arm.
   */
  subcases<S>(build: (inner: Match) => Match<S>): Match<R | S> {
    return this.append(value => build(new Match(value)).outcome());
  }

  outcome(): Outcome<R> {
    for (const arm of this.arms) {
      const r = arm(this.value);
      if (isDone(r)) return r;
    }
    return NO_MATCH;
  }

  get(): R {
    const r = this.outcome();
    if (isDone(r)) return r.value;
    throw new MatchError(this.value, "no case matches", makeDiagnostic("P0002", { value: previewValue(this.value) }));
  }

  getOr<D>(fallback: D): R | D {
    const r = this.outcome();
    return isDone(r) ? r.value : fallback;
  }

  private append<S>(arm: Arm<S>): Match<R | S> {
    const arms: ReadonlyArray<Arm<R | S>> = [...this.arms, arm];
    return new Match<R | S>(this.value, arms);
  }
}

export function matchValue(value: unknown): Match {
  return new Match(value);
}
