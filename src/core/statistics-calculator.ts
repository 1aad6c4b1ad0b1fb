/**
 * statistics-calculator.ts
 * Reductions over a sequence of readings. Pure: no Dataset state involved.
 */

import type { DatasetStatistics } from '../models/statistics.js';

/** Sum of all values; 0 for an empty sequence. */
export function calculateTotal(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/** Arithmetic mean; 0 for an empty sequence. */
export function calculateAverage(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return calculateTotal(values) / values.length;
}

/** Smallest value, or null for an empty sequence. */
export function calculateMinimum(values: readonly number[]): number | null {
  const [first] = values;
  if (first === undefined) return null;

  let minimum = first;
  for (const value of values) {
    if (value < minimum) minimum = value;
  }
  return minimum;
}

/** Largest value, or null for an empty sequence. */
export function calculateMaximum(values: readonly number[]): number | null {
  const [first] = values;
  if (first === undefined) return null;

  let maximum = first;
  for (const value of values) {
    if (value > maximum) maximum = value;
  }
  return maximum;
}

export function summarize(values: readonly number[]): DatasetStatistics {
  return {
    total: calculateTotal(values),
    average: calculateAverage(values),
    minimum: calculateMinimum(values),
    maximum: calculateMaximum(values),
    count: values.length,
  };
}
