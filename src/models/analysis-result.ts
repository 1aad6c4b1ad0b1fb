/**
 * analysis-result.ts
 * Outcome of one orchestrated analysis run.
 */

import type { DatasetStatistics } from './statistics.js';

export type AnalysisStage = 'data' | 'categories';

/**
 * What the orchestrator does when a stage fails.
 * - abort: stop the run, nothing further is computed or written.
 * - continue: log the failure and carry on with the stage's state left empty.
 */
export type StageFailurePolicy = 'abort' | 'continue';

export interface AnalysisRunResult {
  status: 'completed' | 'aborted';
  statistics?: DatasetStatistics;
  /** Unique categories, sorted. */
  categories: string[];
  reportSaved: boolean;
  /** Errors raised by a stage, keyed by the stage that raised them. */
  errors: Partial<Record<AnalysisStage, Error>>;
}
