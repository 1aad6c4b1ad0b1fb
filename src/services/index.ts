/**
 * services/index.ts
 * Barrel export for the utility services.
 */

export { FileService, splitLines } from './file-service.js';
export { ReportRenderer, classifyPerformance, formatLabelList } from './report-renderer.js';
export type { ReportInput } from './report-renderer.js';
export { DatasetError, ConfigError, isDatasetError, errorMessage } from './dataset-error.js';
export type { DatasetErrorKind } from './dataset-error.js';
export { resolveConfig, readConfigFile, parseConfigObject } from './config-loader.js';
export { ConsoleLogger, FileLogger, TeeLogger, SilentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { StdoutSink, MemorySink } from './output-sink.js';
export type { OutputSink } from './output-sink.js';
