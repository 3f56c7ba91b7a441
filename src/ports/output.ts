/**
 * Output port interface.
 * Receives the contractual output lines (one verdict per check-sat).
 */
export interface OutputPort {
  writeLine(line: string): void;
}

export function consoleOutput(): OutputPort {
  return {
    writeLine(line) {
      console.log(line);
    },
  };
}

/** Collects lines in memory. */
export class BufferedOutput implements OutputPort {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }
}
