/**
 * models/index.ts
 * Barrel export for the model package.
 */

export type { AnalysisConfig } from './analysis-config.js';
export { DEFAULT_ANALYSIS_CONFIG } from './analysis-config.js';

export type { DatasetStatistics, PerformanceVerdict } from './statistics.js';

export type {
  AnalysisStage,
  StageFailurePolicy,
  AnalysisRunResult,
} from './analysis-result.js';
