/**
 * statistics.ts
 * Summary statistics computed over the loaded readings.
 */

/**
 * Full statistics record. Always replaced as a whole, never patched.
 *
 * `minimum` and `maximum` are null only when computed over no values,
 * which a Dataset never stores.
 */
export interface DatasetStatistics {
  total: number;
  average: number;
  minimum: number | null;
  maximum: number | null;
  count: number;
}

export type PerformanceVerdict = 'High Performance' | 'Needs Improvement';
