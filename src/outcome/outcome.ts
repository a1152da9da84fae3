// src/outcome/outcome.ts
// Tagged result returned by every pattern attempt

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
}

export interface Fail {
  readonly tag: "Fail";
  /** Short note on why the attempt failed (diagnostics only) */
  readonly reason?: string;
}

export type Outcome<A> = Done<A> | Fail;
export type Ok<A> = Done<A>;
export type Err = Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
