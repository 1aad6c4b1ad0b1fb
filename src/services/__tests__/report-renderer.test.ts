/**
 * report-renderer.test.ts
 *
 * Covers:
 *   1. Performance classification at, above and below the threshold
 *   2. Number and average formatting
 *   3. Quoted category list rendering and code point ordering
 *   4. Report text with no categories
 */

import {
  ReportRenderer,
  classifyPerformance,
  formatAverage,
  formatLabelList,
  formatNumber,
  formatReading,
  sortCategories,
} from '../report-renderer.js';
import type { DatasetStatistics } from '../../models/statistics.js';

const STATS: DatasetStatistics = {
  total: 145,
  average: 72.5,
  minimum: 70,
  maximum: 75,
  count: 2,
};

describe('ReportRenderer', () => {
  describe('classifyPerformance', () => {
    it('is high only strictly above the threshold', () => {
      expect(classifyPerformance(85.01, 85)).toBe('High Performance');
      expect(classifyPerformance(85, 85)).toBe('Needs Improvement');
      expect(classifyPerformance(10, 85)).toBe('Needs Improvement');
    });
  });

  describe('formatting', () => {
    it('prints the threshold as configured', () => {
      expect(formatNumber(85)).toBe('85');
      expect(formatNumber(72.5)).toBe('72.5');
    });

    it('prints readings in float form', () => {
      expect(formatReading(265)).toBe('265.0');
      expect(formatReading(80)).toBe('80.0');
      expect(formatReading(88.5)).toBe('88.5');
      expect(formatReading(-0.25)).toBe('-0.25');
      expect(formatReading(1234.5678)).toBe('1234.5678');
      expect(formatReading(0.0001)).toBe('0.0001');
      expect(formatReading(1e15)).toBe('1000000000000000.0');
      expect(formatReading(1e16)).toBe('1e+16');
      expect(formatReading(-1.5e20)).toBe('-1.5e+20');
      expect(formatReading(0.000025)).toBe('2.5e-05');
      expect(formatReading(1e-100)).toBe('1e-100');
    });

    it('spells zero, non-finite and absent readings', () => {
      expect(formatReading(0)).toBe('0.0');
      expect(formatReading(-0)).toBe('-0.0');
      expect(formatReading(Infinity)).toBe('inf');
      expect(formatReading(-Infinity)).toBe('-inf');
      expect(formatReading(NaN)).toBe('nan');
      expect(formatReading(null)).toBe('None');
    });

    it('prints averages with two decimals', () => {
      expect(formatAverage(265 / 3)).toBe('88.33');
      expect(formatAverage(72.5)).toBe('72.50');
      expect(formatAverage(0)).toBe('0.00');
      expect(formatAverage(-0)).toBe('-0.00');
      expect(formatAverage(1e21)).toBe('1000000000000000000000.00');
      expect(formatAverage(Infinity)).toBe('inf');
      expect(formatAverage(-Infinity)).toBe('-inf');
      expect(formatAverage(NaN)).toBe('nan');
    });

    it('renders label lists with quotes', () => {
      expect(formatLabelList([])).toBe('[]');
      expect(formatLabelList(['math', 'science'])).toBe("['math', 'science']");
      expect(formatLabelList(["Children's Lit"])).toBe(`["Children's Lit"]`);
      expect(formatLabelList([`a'b"c`])).toBe(`['a\\'b"c']`);
    });

    it('escapes backslashes and control characters in labels', () => {
      expect(formatLabelList(['a\tb'])).toBe("['a\\tb']");
      expect(formatLabelList(['x\\y'])).toBe("['x\\\\y']");
      expect(formatLabelList(['bell\x07'])).toBe("['bell\\x07']");
    });

    it('sorts labels by code point', () => {
      expect(sortCategories(['\u{1F600}', '\uFF5E', 'b', 'B'])).toEqual([
        'B',
        'b',
        '\uFF5E',
        '\u{1F600}',
      ]);
    });
  });

  describe('reportText', () => {
    it('renders the fixed layout with an empty category section', () => {
      const text = ReportRenderer.reportText({
        dataPath: 'student_marks.csv',
        categoryPath: 'courses.csv',
        threshold: 85,
        statistics: STATS,
        categories: new Set<string>(),
      });
      const lines = text.split('\n');

      expect(lines.slice(6, 15)).toEqual([
        'Data file: student_marks.csv',
        'Total data points: 2',
        'Total: 145.0',
        'Average: 72.50',
        'Minimum: 70.0',
        'Maximum: 75.0',
        '',
        'Performance: Needs Improvement',
        '(Average 72.50 is below threshold 85)',
      ]);
      expect(lines.slice(-4)).toEqual([
        'Total unique categories: 0',
        'Unique categories: ',
        '='.repeat(50),
        '',
      ]);
    });

    it('sorts categories by code unit order', () => {
      const text = ReportRenderer.reportText({
        dataPath: 'd',
        categoryPath: 'c',
        threshold: 85,
        statistics: STATS,
        categories: ['beta', 'Alpha', 'alpha'],
      });
      expect(text).toContain('Unique categories: Alpha, alpha, beta\n');
    });
  });

  describe('consoleLines', () => {
    it('frames the summary with blank lines', () => {
      const lines = ReportRenderer.consoleLines({
        threshold: 70,
        statistics: STATS,
        categories: ['x'],
      });
      expect(lines[0]).toBe('');
      expect(lines[lines.length - 1]).toBe('');
      expect(lines).toContain('(Average 72.50 is above threshold 70)');
      expect(lines).toContain("Unique categories: ['x']");
    });
  });
});
