import { type Diagnostic, type DiagnosticSeverity, errorDiag, warnDiag } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  M0001: { code: "M0001", severity: "error", category: "Dispatch", template: "No applicable method for {name} with {arity} argument(s)" },
  M0002: { code: "M0002", severity: "error", category: "Dispatch", template: "Pattern constructor for {name} failed on spec {spec}" },
  M0003: { code: "M0003", severity: "error", category: "Dispatch", template: "Declaring callable for {name} returned a non-function" },

  P0001: { code: "P0001", severity: "error", category: "Pattern", template: "Value {value} does not match {pattern}" },
  P0002: { code: "P0002", severity: "error", category: "Pattern", template: "No case matches value {value}" },

  C0001: { code: "C0001", severity: "error", category: "Config", template: "Invalid value for {field}: {value}" },

  W0001: { code: "W0001", severity: "warning", category: "Dispatch", template: "Call supplies {actual} argument(s) for {expected} spec(s)" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const make = def.severity === "warning" ? warnDiag : errorDiag;
  return make(def.code, message, params);
}
