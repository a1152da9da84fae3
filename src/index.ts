// src/index.ts
// multimethods - Public API
//
// Generic functions dispatched by matching call arguments against patterns.

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & FAILURES
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, Ok, Err } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { done, ok, fail, noMatch, NO_MATCH } from "./outcome/constructors";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
export type { Failure, FailureReason } from "./outcome/failure";
export { failure, wrapFailure, isFailureReason, allDiagnostics } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { errorDiag, warnDiag } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { MatchError } from "./outcome/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERNS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/pattern";

// ═══════════════════════════════════════════════════════════════════════════════
// GENERIC FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  declareGeneric,
  registerMethod,
  method,
  invoke,
  lookupMethod,
  type GenericFunction,
  type GenericOptions,
} from "./core/generic";
export {
  applyFirst,
  applyLast,
  applyAll,
  applyReduce,
  applyCandidate,
  type MethodCombiner,
} from "./core/generic";
export {
  dispatch,
  matchEntry,
  resolvePatternConstructor,
  patternIdentity,
  typeDispatch,
  keyDispatch,
  type DispatchTarget,
} from "./core/generic";
export { MethodRegistry, getRecentEvents, clearEventLog, countEvents, type RegisterResult } from "./core/generic";
export { DispatchError } from "./core/generic";
export {
  Keywords,
  kw,
  splitKeywords,
  dispatchKey,
  type SpecToken,
  type KeywordSpecs,
  type KeywordMap,
  type PatternConstructor,
  type DeclaringCallable,
  type PatternSource,
  type Implementation,
  type MethodEntry,
  type Candidate,
  type CallSite,
  type GenericEvent,
} from "./core/generic";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
