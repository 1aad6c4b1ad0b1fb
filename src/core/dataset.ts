/**
 * dataset.ts
 * The Dataset aggregate: readings, unique categories and the statistics
 * computed over the readings.
 *
 * Single-writer discipline:
 * - readings are only appended by loadData(), and only after the whole
 *   file parsed (a failed load leaves them untouched).
 * - categories are only inserted by loadCategories().
 * - statistics are only assigned, as a whole record, by calculateStatistics().
 *
 * Progress and error diagnostics go to the OutputSink; pipeline traces to
 * the Logger.
 */

import { DEFAULT_ANALYSIS_CONFIG } from '../models/analysis-config.js';
import type { DatasetStatistics } from '../models/statistics.js';
import { parseReading } from '../parsers/reading-parser.js';
import { DatasetError, errorMessage } from '../services/dataset-error.js';
import { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { StdoutSink } from '../services/output-sink.js';
import type { OutputSink } from '../services/output-sink.js';
import { ReportRenderer, sortCategories } from '../services/report-renderer.js';
import { summarize } from './statistics-calculator.js';

export const DEFAULT_THRESHOLD = DEFAULT_ANALYSIS_CONFIG.threshold;
export const DEFAULT_REPORT_PATH = DEFAULT_ANALYSIS_CONFIG.outputPath;

export interface DatasetOptions {
  threshold?: number;
  fileService?: FileService;
  output?: OutputSink;
  logger?: Logger;
}

export class Dataset {
  readonly dataPath: string;
  readonly categoryPath: string;
  readonly threshold: number;

  private readonly _readings: number[] = [];
  private readonly _categories = new Set<string>();
  private _statistics: DatasetStatistics | undefined;

  private readonly _files: FileService;
  private readonly _out: OutputSink;
  private readonly _log: Logger;

  constructor(dataPath: string, categoryPath: string, options: DatasetOptions = {}) {
    this.dataPath = dataPath;
    this.categoryPath = categoryPath;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this._files = options.fileService ?? new FileService();
    this._out = options.output ?? new StdoutSink();
    this._log = options.logger ?? new SilentLogger();
  }

  get readings(): readonly number[] {
    return this._readings;
  }

  get categories(): ReadonlySet<string> {
    return this._categories;
  }

  get statistics(): Readonly<DatasetStatistics> | undefined {
    return this._statistics;
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * Load numeric readings from `dataPath`.
   * @throws DatasetError FileNotFound, EmptyInput, InvalidData or NoValidData
   */
  loadData(): void {
    try {
      const lines = this._files.readLines(this.dataPath);
      if (lines.length === 0) {
        throw DatasetError.emptyInput(this.dataPath);
      }

      const parsed: number[] = [];
      for (const raw of lines) {
        const line = raw.trim();
        if (line === '') continue;
        const value = parseReading(line);
        if (value === null) {
          throw DatasetError.invalidData(this.dataPath, line);
        }
        parsed.push(value);
      }

      if (parsed.length === 0) {
        throw DatasetError.noValidData(this.dataPath);
      }

      this._readings.push(...parsed);
      this._log.debug('Readings loaded', { path: this.dataPath, lines: lines.length, values: parsed.length });
      this._out.writeLine(`Successfully loaded ${parsed.length} data points`);
    } catch (err) {
      this._out.writeLine(`Error: ${errorMessage(err)}`);
      throw err;
    }
  }

  /**
   * Load unique category labels from `categoryPath`.
   * @throws DatasetError FileNotFound, EmptyInput or NoValidCategories
   */
  loadCategories(): void {
    try {
      const lines = this._files.readLines(this.categoryPath);
      if (lines.length === 0) {
        throw DatasetError.emptyInput(this.categoryPath, 'Categorical file');
      }

      for (const raw of lines) {
        const label = raw.trim();
        if (label !== '') this._categories.add(label);
      }

      if (this._categories.size === 0) {
        throw DatasetError.noValidCategories(this.categoryPath);
      }

      this._log.debug('Categories loaded', { path: this.categoryPath, unique: this._categories.size });
      this._out.writeLine(`Successfully loaded ${this._categories.size} unique categories`);
    } catch (err) {
      this._out.writeLine(`Error: ${errorMessage(err)}`);
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Statistics
  // ---------------------------------------------------------------------------

  calculateStatistics(): void {
    if (this._readings.length === 0) {
      this._out.writeLine('No data loaded. Please load data first.');
      return;
    }
    this._statistics = summarize(this._readings);
    this._log.debug('Statistics calculated', { ...this._statistics });
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  displayResults(): void {
    if (this._statistics === undefined) {
      this._out.writeLine('No statistics calculated. Please calculate statistics first.');
      return;
    }
    const lines = ReportRenderer.consoleLines({
      threshold: this.threshold,
      statistics: this._statistics,
      categories: this._categories,
    });
    for (const line of lines) {
      this._out.writeLine(line);
    }
  }

  /**
   * Write the plain-text report. Never throws: any failure is reported on
   * the output sink and reflected in the return value.
   *
   * @returns true when the report was written
   */
  saveResults(outputPath: string = DEFAULT_REPORT_PATH): boolean {
    try {
      if (this._statistics === undefined) {
        throw DatasetError.missingStatistics(outputPath);
      }
      const text = ReportRenderer.reportText({
        dataPath: this.dataPath,
        categoryPath: this.categoryPath,
        threshold: this.threshold,
        statistics: this._statistics,
        categories: this._categories,
      });
      this._files.writeText(outputPath, text);
      this._log.debug('Report written', { path: outputPath, bytes: Buffer.byteLength(text, 'utf-8') });
      this._out.writeLine(`Results saved to '${outputPath}'`);
      return true;
    } catch (err) {
      this._log.warn('Report not written', { path: outputPath, error: errorMessage(err) });
      this._out.writeLine(`Error saving results: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Unique categories in report order. */
  sortedCategories(): string[] {
    return sortCategories(this._categories);
  }
}
