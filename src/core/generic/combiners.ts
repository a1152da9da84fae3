// src/core/generic/combiners.ts
// Method combiners: reduce the candidate sequence to the call's result

import { noApplicableMethod } from "./errors";
import { logGenericEvent } from "./registry";
import { type CallSite, type Candidate, Keywords } from "./types";

/**
 * MethodCombiner: strategy chosen when a generic function is declared.
 * Every combiner raises DispatchError when there are no candidates.
 */
export interface MethodCombiner<R, Out> {
  readonly name: string;
  combine(candidates: Iterable<Candidate<R>>, call: CallSite): Out;
}

/**
 * Call a candidate's implementation with its derived arguments. Keyword
 * arguments travel as a trailing Keywords value, only when there are any.
 */
export function applyCandidate<R>(candidate: Candidate<R>): R {
  const names = Object.keys(candidate.kwargs);
  if (names.length === 0) {
    return candidate.method(...candidate.args);
  }
  return candidate.method(...candidate.args, new Keywords(candidate.kwargs));
}

function miss(call: CallSite, combiner: string): Error {
  if (call.trace) {
    logGenericEvent({
      tag: "miss",
      name: call.name,
      arity: call.args.length,
      combiner,
      timestamp: Date.now(),
    }, call.maxEvents);
  }
  return noApplicableMethod(call);
}

/** Result of the earliest matching method; later entries are not tried. */
export function applyFirst<R>(): MethodCombiner<R, R> {
  return {
    name: "applyFirst",
    combine(candidates, call) {
      for (const c of candidates) {
        return applyCandidate(c);
      }
      throw miss(call, this.name);
    },
  };
}

/** Result of the latest matching method. */
export function applyLast<R>(): MethodCombiner<R, R> {
  return {
    name: "applyLast",
    combine(candidates, call) {
      let last: Candidate<R> | undefined;
      for (const c of candidates) {
        last = c;
      }
      if (!last) throw miss(call, this.name);
      return applyCandidate(last);
    },
  };
}

/** Results of every matching method, in registry order. */
export function applyAll<R>(): MethodCombiner<R, R[]> {
  return {
    name: "applyAll",
    combine(candidates, call) {
      const results: R[] = [];
      for (const c of candidates) {
        results.push(applyCandidate(c));
      }
      if (results.length === 0) throw miss(call, this.name);
      return results;
    },
  };
}

/**
 * Left fold of every matching method's result, seeded with the first one.
 */
export function applyReduce<R>(op: (acc: R, next: R) => R): MethodCombiner<R, R> {
  const all = applyAll<R>();
  return {
    name: "applyReduce",
    combine(candidates, call) {
      const [first, ...rest] = all.combine(candidates, call);
      return rest.reduce(op, first);
    },
  };
}
