/**
 * cli-args.ts
 * Command-line argument parsing for the analysis CLI.
 */

import type { AnalysisConfig } from './models/analysis-config.js';
import { ConfigError } from './services/dataset-error.js';

export interface CliArgs {
  overrides: Partial<AnalysisConfig>;
  configPath?: string;
  debug: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: dataset-analysis [options]',
  '',
  '  --data <file>        numeric readings, one per line (default: student_marks.csv)',
  '  --categories <file>  category labels, one per line (default: courses.csv)',
  '  --threshold <n>      high-performance threshold (default: 85)',
  '  --output <file>      report destination (default: analysis_report.txt)',
  '  --config <file>      JSON config file; flags take precedence over it',
  '  --debug              emit debug-level pipeline logs and write a log file',
  '  --help               show this message',
].join('\n');

const VALUE_FLAGS = ['--data', '--categories', '--threshold', '--output', '--config'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

const VALUE_FLAG_SET: ReadonlySet<string> = new Set(VALUE_FLAGS);

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAG_SET.has(flag);
}

/**
 * Parse argv (without the node and script entries).
 * Accepts both `--flag value` and `--flag=value`.
 * @throws ConfigError on unknown flags, missing values or a non-numeric threshold
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { overrides: {}, debug: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.indexOf('=');
    const flag = token.startsWith('--') && eq > 0 ? token.slice(0, eq) : token;

    if (flag === '--debug') {
      args.debug = true;
      continue;
    }
    if (flag === '--help' || flag === '-h') {
      args.help = true;
      continue;
    }
    if (!isValueFlag(flag)) {
      throw new ConfigError(`Unknown argument '${token}'`);
    }

    let value: string | undefined;
    if (flag !== token) {
      value = token.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new ConfigError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case '--data':
        args.overrides.dataPath = value;
        break;
      case '--categories':
        args.overrides.categoryPath = value;
        break;
      case '--output':
        args.overrides.outputPath = value;
        break;
      case '--config':
        args.configPath = value;
        break;
      case '--threshold': {
        const threshold = Number(value);
        if (!Number.isFinite(threshold)) {
          throw new ConfigError(`--threshold must be a finite number, got '${value}'`);
        }
        args.overrides.threshold = threshold;
        break;
      }
    }
  }

  return args;
}
