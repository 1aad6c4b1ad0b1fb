#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for the dataset analysis.
 *
 * Exit codes:
 *   0  run completed (the report may still have failed to save)
 *   1  run aborted while loading readings, or an unexpected error
 *   2  usage or configuration error
 *
 * Usage:
 *   node dist/cli.js [--data <file>] [--categories <file>] [--threshold <n>]
 *                    [--output <file>] [--config <file>] [--debug]
 */

import * as path from 'node:path';
import { parseCliArgs, USAGE } from './cli-args.js';
import type { CliArgs } from './cli-args.js';
import type { AnalysisConfig } from './models/index.js';
import { AnalysisOrchestrator } from './orchestrator/index.js';
import {
  ConfigError,
  ConsoleLogger,
  errorMessage,
  FileLogger,
  resolveConfig,
  StdoutSink,
  TeeLogger,
} from './services/index.js';

interface Invocation {
  args: CliArgs;
  cfg: AnalysisConfig;
}

/** Parse flags and resolve the config; returns an exit code when the run should not start. */
function prepare(argv: readonly string[]): Invocation | number {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    const cfg = resolveConfig({
      overrides: args.overrides,
      ...(args.configPath !== undefined && { configPath: args.configPath }),
    });
    return { args, cfg };
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      console.error('');
      console.error(USAGE);
      return 2;
    }
    throw err;
  }
}

function main(argv: readonly string[]): number {
  const prepared = prepare(argv);
  if (typeof prepared === 'number') return prepared;
  const { args, cfg } = prepared;

  const auditLog = args.debug ? new FileLogger('debug') : undefined;
  const logger =
    auditLog !== undefined ? new TeeLogger([new ConsoleLogger('debug'), auditLog]) : undefined;

  try {
    const result = new AnalysisOrchestrator(cfg, {
      output: new StdoutSink(),
      ...(logger !== undefined && { logger }),
    }).run();
    return result.status === 'completed' ? 0 : 1;
  } catch (err) {
    console.error(`Analysis FAILED: ${errorMessage(err)}`);
    if (args.debug && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 1;
  } finally {
    // Write log file when --debug is used
    if (auditLog !== undefined) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
      const logPath = path.join('logs', timestamp, 'analysis.log');
      auditLog.flush(path.resolve(logPath));
      console.log(`Debug log written to ${logPath}`);
    }
  }
}

process.exitCode = main(process.argv.slice(2));
