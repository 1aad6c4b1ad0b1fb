/**
 * dataset-error.ts
 * Error types raised while loading input files and writing the report.
 */

export type DatasetErrorKind =
  | 'FileNotFound'
  | 'EmptyInput'
  | 'InvalidData'
  | 'NoValidData'
  | 'NoValidCategories'
  | 'MissingStatistics';

export interface DatasetErrorDetails {
  /** File the error refers to. */
  path: string;
  /** Offending line text, for InvalidData. */
  value?: string;
}

export class DatasetError extends Error {
  readonly kind: DatasetErrorKind;
  readonly path: string;
  readonly value: string | undefined;

  constructor(kind: DatasetErrorKind, message: string, details: DatasetErrorDetails) {
    super(message);
    this.name = 'DatasetError';
    this.kind = kind;
    this.path = details.path;
    this.value = details.value;
  }

  static fileNotFound(path: string): DatasetError {
    return new DatasetError('FileNotFound', `File '${path}' not found`, { path });
  }

  static emptyInput(path: string, label = 'File'): DatasetError {
    return new DatasetError('EmptyInput', `${label} '${path}' is empty`, { path });
  }

  static invalidData(path: string, value: string): DatasetError {
    return new DatasetError(
      'InvalidData',
      `Invalid data found in '${path}': '${value}' is not a number`,
      { path, value },
    );
  }

  static noValidData(path: string): DatasetError {
    return new DatasetError('NoValidData', `No valid numerical data found in '${path}'`, { path });
  }

  static noValidCategories(path: string): DatasetError {
    return new DatasetError('NoValidCategories', `No valid categories found in '${path}'`, { path });
  }

  static missingStatistics(path: string): DatasetError {
    return new DatasetError(
      'MissingStatistics',
      'No statistics calculated. Please calculate statistics first.',
      { path },
    );
  }
}

export function isDatasetError(err: unknown): err is DatasetError {
  return err instanceof DatasetError;
}

/**
 * Raised for unreadable or invalid configuration (config file or CLI flags).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Message of any thrown value, without a stack. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
