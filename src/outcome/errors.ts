import type { Diagnostic } from "./diagnostic";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import { previewValue } from "./preview";

/**
 * Raised when a match result is forced (getMatch, unwrap, Match.get)
 * and no pattern applied.
 */
export class MatchError extends Error {
  public readonly failure: Failure;

  constructor(
    public readonly value: unknown,
    public readonly detail?: string,
    diagnostic?: Diagnostic
  ) {
    const shown = previewValue(value);
    super(`MatchError: value ${shown} does not match${detail ? ` (${detail})` : ""}`);
    this.name = "MatchError";
    this.failure = failure("match-failed", this.message, {
      diagnostics: [diagnostic ?? makeDiagnostic("P0001", { value: shown, pattern: detail ?? "pattern" })],
      recoverable: true,
    });
  }
}
