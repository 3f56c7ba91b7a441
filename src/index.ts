// src/index.ts
// sexpsat - Public API
//
// Reader, elaborator and driver for SMT-LIB 2 constraint scripts,
// plus the rename refactoring over the same scripts.

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export { type Atom, type List, type GenericNode, atom, list, nodeToString, nodeEq, headAtom } from "./core/reader/node";
export { type ReaderOptions, type ParseResult, parseOne, parseAll, skipWhitespace, isWhiteSpace } from "./core/reader/parse";
export { stripComments, blankComments } from "./core/reader/source";
export type { Span } from "./core/reader/span";

// ═══════════════════════════════════════════════════════════════════════════════
// SORTS & ELABORATION
// ═══════════════════════════════════════════════════════════════════════════════

export { type Sort, parseSortName } from "./core/sorts/sort";
export { type Scope, type SortEnv, sortEnvEmpty, scopeLookup, scopeExtend, scopeDefine } from "./core/sorts/scope";
export { type ElaboratedExpression, exprToString, BOOL_OPERATORS } from "./core/elaborate/expr";
export { type ElaborateOptions, elaborate } from "./core/elaborate/elaborate";
export { parseNumeral } from "./core/elaborate/numeral";

// ═══════════════════════════════════════════════════════════════════════════════
// DRIVER
// ═══════════════════════════════════════════════════════════════════════════════

export { Dispatcher, type DispatcherDeps, type DriverState } from "./core/driver/dispatcher";
export { runScript, type RunOptions, type RunResult } from "./core/driver/run";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export type { SolverPort, Verdict, CheckOptions, CheckResult } from "./ports/solver";
export { verdictText } from "./ports/solver";
export { type OutputPort, BufferedOutput, consoleOutput } from "./ports/output";
export { type TraceSink, type TraceEvent, consoleTraceSink, nullTraceSink, formatTraceEvent } from "./ports/trace";
export { Z3SolverAdapter, releaseZ3 } from "./adapters/z3Solver";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export type { Diagnostic } from "./outcome/diagnostic";
export { formatDiagnostic } from "./outcome/diagnostic";
export {
  ScriptError,
  MalformedExpressionError,
  ParseError,
  UnknownCommandError,
  UsageError,
  SolverBackendError,
  RenameError,
} from "./outcome/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// REFACTORING
// ═══════════════════════════════════════════════════════════════════════════════

export { SourceRegistry } from "./refactor/registry";
export {
  type SymbolTarget,
  type TextEdit,
  type RenameResult,
  renameSymbol,
  resolveSymbolAt,
  findReferences,
  applyEdits,
} from "./refactor/rename";
