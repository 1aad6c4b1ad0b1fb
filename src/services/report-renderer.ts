/**
 * report-renderer.ts
 * Text layout of the console summary and the saved report.
 *
 * Constraints:
 * - Output is a pure function of its input: same input → identical text.
 * - Categories are rendered sorted by code point.
 * - The average is always shown with 2 decimals; total, minimum and
 *   maximum in float form (formatReading); the threshold as configured.
 */

import type { DatasetStatistics, PerformanceVerdict } from '../models/statistics.js';

export const RULE_WIDTH = 50;

const HEAVY_RULE = '='.repeat(RULE_WIDTH);
const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

export interface ReportInput {
  dataPath: string;
  categoryPath: string;
  threshold: number;
  statistics: DatasetStatistics;
  categories: Iterable<string>;
}

export class ReportRenderer {
  /**
   * Lines of the on-screen results summary, including the blank lines
   * that frame it.
   */
  static consoleLines(input: Omit<ReportInput, 'dataPath' | 'categoryPath'>): string[] {
    const { statistics, threshold } = input;
    const categories = sortCategories(input.categories);

    return [
      '',
      HEAVY_RULE,
      'DATASET ANALYSIS RESULTS',
      HEAVY_RULE,
      ...ReportRenderer._statisticLines(statistics),
      '',
      ...ReportRenderer._performanceLines(statistics.average, threshold),
      '',
      LIGHT_RULE,
      'CATEGORICAL DATA ANALYSIS',
      LIGHT_RULE,
      `Total unique categories: ${categories.length}`,
      `Unique categories: ${formatLabelList(categories)}`,
      HEAVY_RULE,
      '',
    ];
  }

  /** Full report file contents, newline-terminated. */
  static reportText(input: ReportInput): string {
    const { statistics, threshold } = input;
    const categories = sortCategories(input.categories);

    const lines = [
      HEAVY_RULE,
      'DATASET ANALYSIS REPORT',
      HEAVY_RULE,
      '',
      'NUMERICAL DATA STATISTICS',
      LIGHT_RULE,
      `Data file: ${input.dataPath}`,
      ...ReportRenderer._statisticLines(statistics),
      '',
      ...ReportRenderer._performanceLines(statistics.average, threshold),
      '',
      'CATEGORICAL DATA ANALYSIS',
      LIGHT_RULE,
      `Categories file: ${input.categoryPath}`,
      `Total unique categories: ${categories.length}`,
      `Unique categories: ${categories.join(', ')}`,
      HEAVY_RULE,
    ];
    return lines.join('\n') + '\n';
  }

  // ---------------------------------------------------------------------------
  // Shared sections
  // ---------------------------------------------------------------------------

  private static _statisticLines(statistics: DatasetStatistics): string[] {
    return [
      `Total data points: ${statistics.count}`,
      `Total: ${formatReading(statistics.total)}`,
      `Average: ${formatAverage(statistics.average)}`,
      `Minimum: ${formatReading(statistics.minimum)}`,
      `Maximum: ${formatReading(statistics.maximum)}`,
    ];
  }

  private static _performanceLines(average: number, threshold: number): string[] {
    const verdict = classifyPerformance(average, threshold);
    const relation = verdict === 'High Performance' ? 'above' : 'below';
    return [
      `Performance: ${verdict}`,
      `(Average ${formatAverage(average)} is ${relation} threshold ${formatNumber(threshold)})`,
    ];
  }
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

/** High performance only when the average is strictly above the threshold. */
export function classifyPerformance(average: number, threshold: number): PerformanceVerdict {
  return average > threshold ? 'High Performance' : 'Needs Improvement';
}

/** Threshold as configured: `85`, `72.5`. */
export function formatNumber(value: number): string {
  return String(value);
}

/**
 * Reading-derived value in float form: integral values keep a `.0`,
 * non-finite values print as `inf`/`-inf`/`nan`, negative zero keeps its
 * sign, and magnitudes at or above 1e16 or below 1e-4 switch to exponent
 * notation (`1e+16`, `2.5e-05`). Absent values print as `None`.
 */
export function formatReading(value: number | null): string {
  if (value === null) return 'None';
  if (!Number.isFinite(value)) return nonFinite(value);
  if (value === 0) return Object.is(value, -0) ? '-0.0' : '0.0';

  const sign = value < 0 ? '-' : '';
  // Shortest round-trip digits, e.g. "2.65e+2" → digits "265", exponent 2.
  const [mantissa = '', exp = '0'] = Math.abs(value).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exponent = Number(exp);

  if (exponent >= 16 || exponent < -4) {
    const fraction = digits.length > 1 ? '.' + digits.slice(1) : '';
    const expSign = exponent < 0 ? '-' : '+';
    const expDigits = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${digits[0] ?? ''}${fraction}e${expSign}${expDigits}`;
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const intPart = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
  const fracPart = digits.slice(exponent + 1);
  return `${sign}${intPart}.${fracPart === '' ? '0' : fracPart}`;
}

/** Average with two decimals: `88.33`, `-0.00`, `inf`. */
export function formatAverage(value: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);
  if (Math.abs(value) >= 1e21) {
    // toFixed falls back to exponent notation at this magnitude; the value is integral.
    return `${BigInt(value).toString()}.00`;
  }
  const fixed = value.toFixed(2);
  return Object.is(value, -0) ? `-${fixed}` : fixed;
}

function nonFinite(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  return value > 0 ? 'inf' : '-inf';
}

/** Sorted by Unicode code point. */
export function sortCategories(categories: Iterable<string>): string[] {
  return [...categories].sort(compareCodePoints);
}

export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, (ch) => ch.codePointAt(0) ?? 0);
  const right = Array.from(b, (ch) => ch.codePointAt(0) ?? 0);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/**
 * Bracketed, quoted list: `['math', 'science']`.
 * A label containing a single quote (and no double quote) is wrapped in
 * double quotes instead; otherwise single quotes are escaped. Backslashes,
 * tabs, line breaks and other control characters are always escaped.
 */
export function formatLabelList(labels: readonly string[]): string {
  return `[${labels.map(quoteLabel).join(', ')}]`;
}

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
};

function escapeControl(label: string): string {
  return label.replace(/[\\\x00-\x1f\x7f]/g, (ch) => {
    return NAMED_ESCAPES[ch] ?? `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
}

function quoteLabel(label: string): string {
  const escaped = escapeControl(label);
  if (label.includes("'") && !label.includes('"')) {
    return `"${escaped}"`;
  }
  return `'${escaped.replace(/'/g, "\\'")}'`;
}
