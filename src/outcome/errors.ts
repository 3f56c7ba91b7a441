import type { Span } from "../core/reader/span";
import type { Diagnostic } from "./diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "./codes";

// Error Classes
export class ScriptError extends Error {
  readonly code: string;

  constructor(public readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "ScriptError";
    this.code = diagnostic.code;
  }

  get span(): Span | undefined {
    return this.diagnostic.span;
  }
}

/** Wrong arity, wrong node shape, undeclared variable, bad numeral, ill-sorted form. */
export class MalformedExpressionError extends ScriptError {
  constructor(code: DiagnosticCode, params: Record<string, string | number>, span?: Span) {
    super(makeDiagnostic(code, params, span));
    this.name = "MalformedExpressionError";
  }
}

/** Unterminated list, raised only when the reader runs with strict lists. */
export class ParseError extends ScriptError {
  constructor(offset: number, span?: Span) {
    super(makeDiagnostic("E0002", { offset }, span));
    this.name = "ParseError";
  }
}

export class UnknownCommandError extends ScriptError {
  constructor(public readonly command: string, span?: Span) {
    super(makeDiagnostic("E0600", { command }, span));
    this.name = "UnknownCommandError";
  }
}

export class UsageError extends ScriptError {
  constructor(detail: string) {
    super(makeDiagnostic("E0700", { detail }));
    this.name = "UsageError";
  }
}

export class SolverBackendError extends ScriptError {
  constructor(detail: string) {
    super(makeDiagnostic("E0900", { detail }));
    this.name = "SolverBackendError";
  }
}

export class RenameError extends ScriptError {
  constructor(detail: string, span?: Span) {
    super(makeDiagnostic("E0800", { detail }, span));
    this.name = "RenameError";
  }
}

export function isScriptError(e: unknown): e is ScriptError {
  return e instanceof ScriptError;
}
