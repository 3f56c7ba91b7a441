// src/core/driver/run.ts
// Driver loop: read one form, dispatch it, repeat until exit or end of input.

import { parseOne, skipWhitespace, type ReaderOptions } from "../reader/parse";
import { nodeToString } from "../reader/node";
import { stripComments } from "../reader/source";
import type { Verdict } from "../../ports/solver";
import { nullTraceSink } from "../../ports/trace";
import { Dispatcher, type DispatcherDeps } from "./dispatcher";

export type RunOptions = DispatcherDeps & {
  reader?: ReaderOptions;
};

export type RunResult = {
  status: "exit" | "end-of-input";
  /** Number of top-level forms dispatched */
  forms: number;
  verdicts: Verdict[];
};

export async function runScript(input: string, options: RunOptions): Promise<RunResult> {
  const text = stripComments(input);
  const trace = options.trace ?? nullTraceSink;
  const dispatcher = new Dispatcher({ ...options, trace });

  let pos = 0;
  let forms = 0;
  while (true) {
    pos = skipWhitespace(text, pos);
    if (pos >= text.length) break;

    const { node, next } = parseOne(text, pos, options.reader);
    trace.emit({ tag: "E_Parsed", consumed: text.slice(pos, next), form: nodeToString(node) });
    pos = next;

    forms++;
    const state = await dispatcher.dispatch(node);
    if (state === "Terminated") {
      return { status: "exit", forms, verdicts: dispatcher.verdicts };
    }
  }

  return { status: "end-of-input", forms, verdicts: dispatcher.verdicts };
}
