import type { Done, Fail } from "./outcome";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export const ok = done;

/** Shared failure value; a plain non-match allocates nothing. */
export const NO_MATCH: Fail = Object.freeze({ tag: "Fail" });

export function fail(reason?: string): Fail {
  return reason === undefined ? NO_MATCH : { tag: "Fail", reason };
}

export const noMatch = fail;
