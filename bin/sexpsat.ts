#!/usr/bin/env npx tsx
// bin/sexpsat.ts
// sexpsat CLI: run one constraint script against the Z3 back end.
//
// Run:  npx tsx bin/sexpsat.ts [options] <file>

import * as fs from "fs";
import { parseCliArgs, getHelpText, getVersion, buildConfig } from "./sexpsat-cli-lib";
import { loadConfig, validateConfig } from "../src/core/config/config";
import { runScript } from "../src/core/driver/run";
import { Z3SolverAdapter } from "../src/adapters/z3Solver";
import { consoleOutput } from "../src/ports/output";
import { consoleTraceSink, nullTraceSink } from "../src/ports/trace";
import { makeDiagnostic } from "../src/outcome/codes";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { UsageError, isScriptError, type ScriptError } from "../src/outcome/errors";

// Set once the script is read, so errors can name it
let scriptFile: string | undefined;

function describeError(e: ScriptError): string {
  const message = formatDiagnostic(e.diagnostic);
  const span = e.span;
  if (scriptFile === undefined || !span) return message;
  // offsets count characters after comment removal
  return `${scriptFile}@${span.start}: ${message}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  // Usage problems are reported before anything is read
  const cli = buildConfig(cliArgs);
  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });

  const validation = validateConfig(config);
  for (const w of validation.warnings) {
    console.error(formatDiagnostic(makeDiagnostic("W0001", { detail: w })));
  }
  if (!validation.valid) {
    for (const e of validation.errors) console.error(`error: ${e}`);
    return 1;
  }

  // "-" reads the script from stdin
  const input = fs.readFileSync(cli.file === "-" ? 0 : cli.file, "utf8");
  scriptFile = cli.file;
  const solver = await Z3SolverAdapter.create(config.solver);

  await runScript(input, {
    solver,
    output: consoleOutput(),
    trace: config.trace.enabled ? consoleTraceSink() : nullTraceSink,
    reader: config.reader,
    fractionalNumerals: config.elaboration.fractionalNumerals,
    produceModels: config.solver.produceModels,
  });
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch((e: unknown) => {
    if (e instanceof UsageError) {
      console.error(e.message);
      process.exit(2);
    }
    if (isScriptError(e)) {
      console.error(describeError(e));
      process.exit(1);
    }
    console.error("Error:", e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
