import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";
import { MatchError } from "./errors";

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  if (isDone(o)) {
    return { tag: "Done", value: fn(o.value) };
  }
  return o;
}

export function flatMapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  if (isDone(o)) {
    return fn(o.value);
  }
  return o;
}

export function unwrap<A>(o: Outcome<A>, value?: unknown): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new MatchError(value, o.reason);
}

export function unwrapOr<A>(o: Outcome<A>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}
