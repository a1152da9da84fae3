// src/core/generic/errors.ts
// Terminal dispatch errors

import type { Failure } from "../../outcome/failure";
import { failure } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import { previewArgs, previewValue } from "../../outcome/preview";
import type { CallSite, KeywordMap, SpecToken } from "./types";

/**
 * DispatchError: no registered method applies to a call, or the generic
 * function could not build the patterns to decide.
 */
export class DispatchError extends Error {
  constructor(
    public readonly genericName: string,
    public readonly args: readonly unknown[],
    public readonly kwargs: KeywordMap,
    public readonly failure: Failure,
    options?: { cause?: unknown }
  ) {
    super(`DispatchError: ${failure.message}`, options);
    this.name = "DispatchError";
  }
}

export function noApplicableMethod(call: CallSite): DispatchError {
  const shown = previewArgs(call.args, call.kwargs, call.previewDepth);
  return new DispatchError(
    call.name,
    call.args,
    call.kwargs,
    failure("no-applicable-method", `no applicable method for ${call.name}${shown}`, {
      diagnostics: [makeDiagnostic("M0001", { name: call.name, arity: call.args.length })],
      context: { args: call.args, kwargs: call.kwargs },
      recoverable: true,
    })
  );
}

export function invalidSpec(call: CallSite, token: SpecToken, cause: unknown): DispatchError {
  const spec = previewValue(token, call.previewDepth);
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new DispatchError(
    call.name,
    call.args,
    call.kwargs,
    failure("invalid-spec", `cannot build a pattern for ${call.name} from spec ${spec}: ${detail}`, {
      diagnostics: [makeDiagnostic("M0002", { name: call.name, spec })],
      context: { token },
    }),
    { cause }
  );
}

export function invalidConstructor(call: CallSite, returned: unknown): DispatchError {
  return new DispatchError(
    call.name,
    call.args,
    call.kwargs,
    failure("invalid-spec", `declaring callable for ${call.name} returned ${previewValue(returned)}`, {
      diagnostics: [makeDiagnostic("M0003", { name: call.name })],
      context: { returned },
    })
  );
}
