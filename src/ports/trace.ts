import type { Sort } from "../core/sorts/sort";
import type { Verdict } from "./solver";

/**
 * Trace event types for the diagnostic stream.
 * None of this is contractual output.
 */
export type TraceEvent =
  | { tag: "E_Parsed"; consumed: string; form: string }
  | { tag: "E_Binding"; name: string; value: string }
  | { tag: "E_Declared"; name: string; sort: Sort }
  | { tag: "E_Ignored"; command: string }
  | { tag: "E_Verdict"; verdict: Verdict };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTraceSink: TraceSink = {
  emit() {},
};

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Parsed":
      return `got : ${event.consumed}\n -> ${event.form}`;
    case "E_Binding":
      return `Binding ${event.name} to ${event.value}`;
    case "E_Declared":
      return `Declared ${event.name} : ${event.sort}`;
    case "E_Ignored":
      return `Ignoring '${event.command}'`;
    case "E_Verdict":
      return `Verdict: ${event.verdict}`;
  }
}

/** Writes every event to stderr. */
export function consoleTraceSink(): TraceSink {
  return {
    emit(event) {
      console.error(formatTraceEvent(event));
    },
  };
}
