/**
 * analysis-config.ts
 * Configuration for a single dataset analysis run.
 */

/**
 * Analysis configuration passed to the orchestrator.
 * Relative paths are resolved against the working directory.
 */
export interface AnalysisConfig {
  /** Numeric readings file, one value per line. */
  dataPath: string;
  /** Categorical labels file, one label per line. */
  categoryPath: string;
  /** Averages strictly above this value are classified as high performance. */
  threshold: number;
  /** Destination of the plain-text report. */
  outputPath: string;
}

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = {
  dataPath: 'student_marks.csv',
  categoryPath: 'courses.csv',
  threshold: 85,
  outputPath: 'analysis_report.txt',
};
