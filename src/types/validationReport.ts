/**
 * Findings and the validation report.
 *
 * Field names on these records are the persisted wire format consumed by
 * downstream tooling (recommendations are routed by `type`), hence the
 * snake_case payload keys.
 */

export type ErrorSeverity = 'critical' | 'high' | 'medium';

interface ErrorFindingBase<T extends string, S extends ErrorSeverity> {
  readonly type: T;
  readonly message: string;
  readonly severity: S;
}

interface WarningFindingBase<T extends string> {
  readonly type: T;
  readonly message: string;
}

// Critical: abort the pipeline
export type FileNotFoundFinding = ErrorFindingBase<'FileNotFound', 'critical'>;

export type InvalidFileFormatFinding = ErrorFindingBase<'InvalidFileFormat', 'critical'>;

export interface MissingColumnsFinding extends ErrorFindingBase<'MissingColumns', 'critical'> {
  readonly columns: readonly string[];
}

// High: recorded, pipeline continues
export interface DuplicateRowsFinding extends ErrorFindingBase<'DuplicateRows', 'high'> {
  readonly count: number;
  readonly row_indices: readonly number[];
}

export interface InvalidDatesFinding extends ErrorFindingBase<'InvalidDates', 'high'> {
  readonly count: number;
  readonly examples: readonly (string | null)[];
}

export interface MissingDataFinding extends ErrorFindingBase<'MissingData', 'high'> {
  readonly column: string;
  readonly count: number;
  readonly percentage: number;
  readonly row_indices: readonly number[];
}

export interface NonNumericValuesFinding extends ErrorFindingBase<'NonNumericValues', 'high'> {
  readonly column: string;
  readonly count: number;
  readonly examples: readonly string[];
}

export interface NegativeValuesFinding extends ErrorFindingBase<'NegativeValues', 'high'> {
  readonly column: string;
  readonly count: number;
  readonly examples: readonly (number | string)[];
  readonly row_indices: readonly number[];
}

// Medium
export interface MissingMonthsFinding extends ErrorFindingBase<'MissingMonths', 'medium'> {
  readonly count: number;
  readonly missing_months: readonly string[];
}

// Warnings never block a PASS
export interface EmptyRowsFinding extends WarningFindingBase<'EmptyRows'> {
  readonly count: number;
}

export interface ExtremeValuesFinding extends WarningFindingBase<'ExtremeValues'> {
  readonly column: string;
  readonly count: number;
  readonly examples: readonly (number | string)[];
  readonly threshold: number;
}

export interface PotentialUnitMismatchFinding extends WarningFindingBase<'PotentialUnitMismatch'> {
  readonly column: string;
  readonly count: number;
  readonly median: number;
  readonly examples: readonly (number | string)[];
}

export type ErrorFinding =
  | FileNotFoundFinding
  | InvalidFileFormatFinding
  | MissingColumnsFinding
  | DuplicateRowsFinding
  | InvalidDatesFinding
  | MissingDataFinding
  | NonNumericValuesFinding
  | NegativeValuesFinding
  | MissingMonthsFinding;

export type WarningFinding = EmptyRowsFinding | ExtremeValuesFinding | PotentialUnitMismatchFinding;

export type ValidationStatus = 'PASS' | 'FAIL';

export interface ValidationSummary {
  total_errors: number;
  total_warnings: number;
  rows_processed: number;
}

export interface ValidationReport {
  timestamp: string;
  input_file: string;
  validation_status: ValidationStatus;
  passed: boolean;
  summary: ValidationSummary;
  errors: readonly ErrorFinding[];
  warnings: readonly WarningFinding[];
}

/**
 * Value thresholds applied by the numeric range checks
 */
export interface ValueThresholds {
  minValueThreshold: number;
  maxValueThreshold: number;
}
