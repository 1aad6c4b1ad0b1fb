/**
 * core/index.ts
 * Barrel export for the Dataset aggregate and the statistics functions.
 */

export { Dataset, DEFAULT_THRESHOLD, DEFAULT_REPORT_PATH } from './dataset.js';
export type { DatasetOptions } from './dataset.js';
export {
  calculateTotal,
  calculateAverage,
  calculateMinimum,
  calculateMaximum,
  summarize,
} from './statistics-calculator.js';
