/**
 * analysis-orchestrator.ts
 * Single entry-point for a complete analysis run.
 *
 * Pipeline order:
 *   1. Dataset.loadData()            — failure aborts the run
 *   2. Dataset.calculateStatistics()
 *   3. Dataset.loadCategories()      — failure is logged, categories stay empty
 *   4. Dataset.displayResults()
 *   5. Dataset.saveResults(outputPath) — never throws
 *   6. Return AnalysisRunResult
 */

import type { AnalysisConfig } from '../models/analysis-config.js';
import type {
  AnalysisRunResult,
  AnalysisStage,
  StageFailurePolicy,
} from '../models/analysis-result.js';
import { Dataset } from '../core/index.js';
import { errorMessage, isDatasetError } from '../services/dataset-error.js';
import type { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import type { OutputSink } from '../services/output-sink.js';

/** What happens to the run when a stage throws. */
export const STAGE_FAILURE_POLICY: Readonly<Record<AnalysisStage, StageFailurePolicy>> = {
  data: 'abort',
  categories: 'continue',
};

export interface AnalysisOrchestratorOptions {
  fileService?: FileService;
  output?: OutputSink;
  logger?: Logger;
}

export class AnalysisOrchestrator {
  private readonly _cfg: AnalysisConfig;
  private readonly _options: AnalysisOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: AnalysisConfig, options: AnalysisOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(): AnalysisRunResult {
    this._log.info('Analysis starting', {
      dataPath: this._cfg.dataPath,
      categoryPath: this._cfg.categoryPath,
      threshold: this._cfg.threshold,
    });

    const dataset = new Dataset(this._cfg.dataPath, this._cfg.categoryPath, {
      threshold: this._cfg.threshold,
      logger: this._log,
      ...(this._options.fileService !== undefined && { fileService: this._options.fileService }),
      ...(this._options.output !== undefined && { output: this._options.output }),
    });

    const errors: AnalysisRunResult['errors'] = {};

    // Step 1 — Numeric readings
    this._log.info('Step 1/5  Loading readings');
    if (!this._runStage('data', () => dataset.loadData(), errors)) {
      this._log.info('Analysis aborted');
      return { status: 'aborted', categories: [], reportSaved: false, errors };
    }
    this._log.info('Step 1/5  Done', { readings: dataset.readings.length });

    // Step 2 — Statistics
    this._log.info('Step 2/5  Calculating statistics');
    dataset.calculateStatistics();
    this._log.info('Step 2/5  Done');

    // Step 3 — Categories
    this._log.info('Step 3/5  Loading categories');
    this._runStage('categories', () => dataset.loadCategories(), errors);
    this._log.info('Step 3/5  Done', { categories: dataset.categories.size });

    // Step 4 — Console summary
    this._log.info('Step 4/5  Displaying results');
    dataset.displayResults();

    // Step 5 — Report file
    this._log.info('Step 5/5  Saving report', { path: this._cfg.outputPath });
    const reportSaved = dataset.saveResults(this._cfg.outputPath);
    this._log.info('Step 5/5  Done', { saved: reportSaved });

    this._log.info('Analysis complete');
    const result: AnalysisRunResult = {
      status: 'completed',
      categories: dataset.sortedCategories(),
      reportSaved,
      errors,
    };
    if (dataset.statistics !== undefined) {
      result.statistics = { ...dataset.statistics };
    }
    return result;
  }

  /**
   * Run one stage under its failure policy.
   * @returns false when the stage failed and its policy aborts the run
   */
  private _runStage(
    stage: AnalysisStage,
    step: () => void,
    errors: AnalysisRunResult['errors'],
  ): boolean {
    try {
      step();
      return true;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      errors[stage] = error;

      const policy = STAGE_FAILURE_POLICY[stage];
      this._log.warn(`Stage "${stage}" failed`, {
        policy,
        kind: isDatasetError(err) ? err.kind : error.name,
        error: errorMessage(err),
      });
      return policy !== 'abort';
    }
  }
}
