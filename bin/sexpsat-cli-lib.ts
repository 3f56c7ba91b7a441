// bin/sexpsat-cli-lib.ts
// Shared CLI utilities for the sexpsat command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { ConfigOverrides } from "../src/core/config/config";
import { UsageError } from "../src/outcome/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  quiet?: boolean;
  strict?: boolean;
  models?: boolean;
  configFile?: string;
  timeoutMs?: number;
  files: string[];
  unknownFlags: string[];
};

export type CliConfig = {
  file: string;
  configFile?: string;
  overrides: ConfigOverrides;
};

export const USAGE = "Usage: sexpsat [options] <smtlib2 file>";

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { files: [], unknownFlags: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--strict") {
      result.strict = true;
    } else if (arg === "--models") {
      result.models = true;
    } else if (arg === "--config") {
      result.configFile = args[++i];
    } else if (arg === "--timeout") {
      const n = parseInt(args[++i] ?? "", 10);
      if (!Number.isNaN(n)) result.timeoutMs = n;
    } else if (arg.startsWith("-") && arg !== "-") {
      result.unknownFlags.push(arg);
    } else {
      result.files.push(arg);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
sexpsat - check satisfiability of an SMT-LIB 2 constraint script

${USAGE}

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -q, --quiet                        Do not write the trace to stderr
  --strict                           Reject lists left open at end of input
  --models                           Ask the solver for a model after sat
  --timeout <ms>                     Solver timeout per check-sat
  --config <file>                    Read configuration from a JSON or YAML file

COMMANDS UNDERSTOOD:
  (declare-fun <name> () Real|Bool)  Declare a variable
  (assert <expr>)                    Add a constraint
  (check-sat)                        Print sat, unsat or unknown
  (exit)                             Stop reading input
  (set-info ...) (set-logic ...) (define-fun ...) are ignored.

EXAMPLES:
  sexpsat problem.smt2
  sexpsat --quiet --timeout 5000 problem.smt2
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `sexpsat v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "sexpsat v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/** Throws UsageError unless exactly one input file was given. */
export function buildConfig(args: CliArgs): CliConfig {
  if (args.unknownFlags.length > 0) {
    throw new UsageError(`unknown option ${args.unknownFlags.join(", ")}\n${USAGE}`);
  }
  const [file] = args.files;
  if (args.files.length !== 1 || file === undefined) {
    throw new UsageError(USAGE);
  }

  const overrides: ConfigOverrides = {};
  if (args.quiet) overrides.trace = { enabled: false };
  if (args.strict) overrides.reader = { strictLists: true };
  if (args.models || args.timeoutMs !== undefined) {
    const solver: NonNullable<ConfigOverrides["solver"]> = {};
    if (args.models) solver.produceModels = true;
    if (args.timeoutMs !== undefined) solver.timeoutMs = args.timeoutMs;
    overrides.solver = solver;
  }

  const config: CliConfig = { file, overrides };
  if (args.configFile) config.configFile = args.configFile;
  return config;
}
