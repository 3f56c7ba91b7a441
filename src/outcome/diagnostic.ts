import type { Span } from "../core/reader/span";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.severity}[${d.code}]: ${d.message}`;
}
