/**
 * logger.ts
 * Structured logger for the analysis pipeline.
 *
 * Pipeline code takes a `Logger` and defaults to SilentLogger. The CLI
 * builds a TeeLogger over a ConsoleLogger and a FileLogger under --debug.
 * User-facing diagnostics do not go through here, see output-sink.ts.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// Padded to a common width so messages line up.
const LEVEL_LABEL: Record<EmittingLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const DEFAULT_PREFIX = 'dataset-analysis';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format one log line: `HH:MM:SS.mmm [prefix] [LEVEL] message  {context}`.
 */
export function formatLogLine(
  now: Date,
  prefix: string,
  label: string,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = now.toISOString().slice(11, 23);
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${label}] ${message}${ctx}`;
}

/**
 * Level filtering and line formatting; subclasses only decide where a
 * formatted line goes.
 */
abstract class LineLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;

  protected constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract emit(level: EmittingLevel, line: string): void;

  private _log(level: EmittingLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this._minLevel) return;
    this.emit(level, formatLogLine(new Date(), this._prefix, LEVEL_LABEL[level], message, context));
  }
}

/** Errors to stderr, everything else to stdout. */
export class ConsoleLogger extends LineLogger {
  constructor(level: LogLevel = 'info', prefix = DEFAULT_PREFIX) {
    super(level, prefix);
  }

  protected emit(level: EmittingLevel, line: string): void {
    const stream = level === 'error' ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }
}

/** Buffers lines until flush(); used for the --debug audit log. */
export class FileLogger extends LineLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_PREFIX) {
    super(level, prefix);
  }

  /** Buffered lines, oldest first. */
  get lines(): readonly string[] {
    return this._lines;
  }

  /** Write buffered lines to a file, creating parent directories. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected emit(_level: EmittingLevel, line: string): void {
    this._lines.push(line);
  }
}

/** Forwards every call to each target in order. */
export class TeeLogger implements Logger {
  private readonly _targets: readonly Logger[];

  constructor(targets: readonly Logger[]) {
    this._targets = targets;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const target of this._targets) target.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const target of this._targets) target.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const target of this._targets) target.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const target of this._targets) target.error(message, context);
  }
}

/** Default when no logger is supplied. */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
