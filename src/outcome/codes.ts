import type { Span } from "../core/reader/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unterminated list starting at offset {offset}" },

  E0101: { code: "E0101", severity: "error", category: "Sort", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Sort", template: "Wrong number of elements in {form}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Sort", template: "Invalid numeral: {text}" },

  E0600: { code: "E0600", severity: "error", category: "Command", template: "Unknown command: {command}" },

  E0700: { code: "E0700", severity: "error", category: "Usage", template: "{detail}" },

  E0800: { code: "E0800", severity: "error", category: "Rename", template: "{detail}" },

  E0900: { code: "E0900", severity: "error", category: "Solver", template: "Solver back end failed: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Config", template: "{detail}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message,
  };
  if (span) diag.span = span;
  if (params) diag.data = { ...params };
  return diag;
}
