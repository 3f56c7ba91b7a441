// src/core/driver/dispatcher.ts
// Top-level command interpretation. One Dispatcher owns the global sort
// scope for the whole run and is the only thing that replaces it.

import type { GenericNode, List } from "../reader/node";
import { headAtom, nodeSpan, nodeToString } from "../reader/node";
import type { SortEnv } from "../sorts/scope";
import { scopeDefine, sortEnvEmpty } from "../sorts/scope";
import { parseSortName } from "../sorts/sort";
import { elaborate } from "../elaborate/elaborate";
import type { SolverPort, Verdict } from "../../ports/solver";
import { verdictText } from "../../ports/solver";
import type { OutputPort } from "../../ports/output";
import type { TraceSink } from "../../ports/trace";
import { nullTraceSink } from "../../ports/trace";
import { MalformedExpressionError, UnknownCommandError } from "../../outcome/errors";

export type DriverState = "Running" | "Terminated";

export type DispatcherDeps = {
  solver: SolverPort;
  output: OutputPort;
  trace?: TraceSink;
  fractionalNumerals?: boolean;
  produceModels?: boolean;
};

const IGNORED_COMMANDS: ReadonlySet<string> = new Set(["set-info", "set-logic", "define-fun"]);

export class Dispatcher {
  private env: SortEnv = sortEnvEmpty();
  private state: DriverState = "Running";
  private readonly trace: TraceSink;
  readonly verdicts: Verdict[] = [];

  constructor(private readonly deps: DispatcherDeps) {
    this.trace = deps.trace ?? nullTraceSink;
  }

  get sorts(): SortEnv {
    return this.env;
  }

  get current(): DriverState {
    return this.state;
  }

  async dispatch(form: GenericNode): Promise<DriverState> {
    if (this.state === "Terminated") return this.state;

    if (form.tag !== "List") {
      throw new MalformedExpressionError("E0001", { detail: `expected a command, got atom ${form.text}` }, nodeSpan(form));
    }
    const head = headAtom(form);
    if (!head) {
      throw new MalformedExpressionError("E0001", { detail: `command name missing in ${nodeToString(form)}` }, nodeSpan(form));
    }

    const cmd = head.text;
    if (IGNORED_COMMANDS.has(cmd)) {
      this.trace.emit({ tag: "E_Ignored", command: cmd });
      return this.state;
    }

    switch (cmd) {
      case "declare-fun":
        this.declareFun(form);
        break;
      case "assert":
        this.assert(form);
        break;
      case "check-sat":
        await this.checkSat();
        break;
      case "exit":
        this.state = "Terminated";
        break;
      default:
        throw new UnknownCommandError(cmd, nodeSpan(head));
    }
    return this.state;
  }

  private declareFun(form: List): void {
    requireArity(form, "declare-fun", 4);
    const [, name, params, sortName] = form.items;
    if (name?.tag !== "Atom") {
      throw new MalformedExpressionError("E0001", { detail: "declare-fun expects a variable name" }, nodeSpan(form));
    }
    if (params?.tag !== "List" || params.items.length !== 0) {
      throw new MalformedExpressionError("E0001", { detail: `only nullary declarations are supported: ${nodeToString(form)}` }, nodeSpan(form));
    }
    const sort = sortName?.tag === "Atom" ? parseSortName(sortName.text) : undefined;
    if (!sort) {
      throw new MalformedExpressionError(
        "E0001",
        { detail: `declared sort must be Real or Bool in ${nodeToString(form)}` },
        nodeSpan(form)
      );
    }

    this.env = scopeDefine(this.env, name.text, sort);
    this.trace.emit({ tag: "E_Declared", name: name.text, sort });
    this.deps.solver.declareVariable(name.text, sort);
  }

  /** The expression goes to the solver as elaborated; the back end decides what a non-Bool assertion means. */
  private assert(form: List): void {
    requireArity(form, "assert", 2);
    const [, body] = form.items;
    if (!body) {
      throw new MalformedExpressionError("E0001", { detail: "assert expects an expression" }, nodeSpan(form));
    }

    const e = elaborate(body, this.env, {
      fractionalNumerals: this.deps.fractionalNumerals,
      trace: this.trace,
    });
    this.deps.solver.addAssertion(e);
  }

  private async checkSat(): Promise<void> {
    const { verdict } = await this.deps.solver.check({ produceModel: this.deps.produceModels ?? false });
    this.verdicts.push(verdict);
    this.trace.emit({ tag: "E_Verdict", verdict });
    this.deps.output.writeLine(verdictText(verdict));
  }
}

function requireArity(form: List, name: string, expected: number): void {
  if (form.items.length !== expected) {
    throw new MalformedExpressionError(
      "E0102",
      { form: name, expected, actual: form.items.length },
      nodeSpan(form)
    );
  }
}
