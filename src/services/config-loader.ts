/**
 * config-loader.ts
 * Resolve the AnalysisConfig for a run.
 *
 * Precedence (lowest first): DEFAULT_ANALYSIS_CONFIG, JSON config file,
 * explicit overrides (CLI flags).
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { DEFAULT_ANALYSIS_CONFIG } from '../models/analysis-config.js';
import type { AnalysisConfig } from '../models/analysis-config.js';
import { ConfigError, errorMessage } from './dataset-error.js';

export const AnalysisConfigFileZ = z
  .object({
    dataPath: z.string().min(1),
    categoryPath: z.string().min(1),
    threshold: z.number().finite(),
    outputPath: z.string().min(1),
  })
  .partial()
  .strict();

export type AnalysisConfigFile = z.infer<typeof AnalysisConfigFileZ>;

/**
 * Validate an already-parsed config object.
 * @param source label used in error messages (usually the file path)
 */
export function parseConfigObject(raw: unknown, source: string): AnalysisConfigFile {
  const result = AnalysisConfigFileZ.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid config '${source}': ${issues.join('; ')}`);
  }
  return result.data;
}

/** Read and validate a JSON config file. */
export function readConfigFile(filePath: string): AnalysisConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config '${filePath}': ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config '${filePath}' is not valid JSON: ${errorMessage(err)}`);
  }

  return parseConfigObject(raw, filePath);
}

export interface ResolveConfigOptions {
  configPath?: string;
  overrides?: Partial<AnalysisConfig>;
}

export function resolveConfig(options: ResolveConfigOptions = {}): AnalysisConfig {
  const fromFile = options.configPath !== undefined ? readConfigFile(options.configPath) : {};
  return {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...definedOnly(fromFile),
    ...definedOnly(options.overrides ?? {}),
  };
}

function definedOnly(partial: Partial<AnalysisConfig>): Partial<AnalysisConfig> {
  const out: Partial<AnalysisConfig> = {};
  if (partial.dataPath !== undefined) out.dataPath = partial.dataPath;
  if (partial.categoryPath !== undefined) out.categoryPath = partial.categoryPath;
  if (partial.threshold !== undefined) out.threshold = partial.threshold;
  if (partial.outputPath !== undefined) out.outputPath = partial.outputPath;
  return out;
}
