import type { ValidationReport } from '../../../types/validationReport';
import type { FindingCollector } from '../FindingCollector';

export interface ReportInput {
  inputFile: string;
  findings: FindingCollector;
  rowsProcessed: number;
  timestamp: Date;
}

/**
 * Assembles the final report from a run's findings.
 * Warnings never affect the verdict.
 */
export class ValidationReportBuilder {
  static build({ inputFile, findings, rowsProcessed, timestamp }: ReportInput): ValidationReport {
    const errors = findings.errors;
    const warnings = findings.warnings;
    const passed = errors.length === 0;

    return {
      timestamp: timestamp.toISOString(),
      input_file: inputFile,
      validation_status: passed ? 'PASS' : 'FAIL',
      passed,
      summary: {
        total_errors: errors.length,
        total_warnings: warnings.length,
        rows_processed: rowsProcessed,
      },
      errors,
      warnings,
    };
  }
}
