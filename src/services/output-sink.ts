/**
 * output-sink.ts
 * Destination for user-facing console text: progress diagnostics,
 * error lines and the on-screen results summary.
 */

export interface OutputSink {
  writeLine(line: string): void;
}

/** Writes each line to stdout. */
export class StdoutSink implements OutputSink {
  writeLine(line: string): void {
    process.stdout.write(line + '\n');
  }
}

/** Collects lines in memory. */
export class MemorySink implements OutputSink {
  private readonly _lines: string[] = [];

  writeLine(line: string): void {
    this._lines.push(line);
  }

  get lines(): readonly string[] {
    return this._lines;
  }
}
