// src/outcome/diagnostic.ts
// Diagnostic records attached to failures and ledger events

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Template parameters the message was rendered from */
  data?: Record<string, unknown>;
}

export function errorDiag(code: string, message: string, data?: Record<string, unknown>): Diagnostic {
  return { code, message, severity: "error", data };
}

export function warnDiag(code: string, message: string, data?: Record<string, unknown>): Diagnostic {
  return { code, message, severity: "warning", data };
}
