import { config } from '../../config/env';
import { logger } from '../../config/logger';
import { ValidationError } from '../../errors';
import type { ValidationReport, ValueThresholds } from '../../types/validationReport';
import { FindingCollector } from './FindingCollector';
import { UtilityTableLoader } from './parsers/UtilityTableLoader';
import { ValidationReportBuilder } from './reporting/ValidationReportBuilder';
import { UtilityTable } from './UtilityTable';
import { NumericValidator } from './validators/NumericValidator';
import { RowQualityValidator } from './validators/RowQualityValidator';
import { SchemaValidator } from './validators/SchemaValidator';
import { TemporalValidator } from './validators/TemporalValidator';

export interface ValidationOptions {
  minValueThreshold?: number;
  maxValueThreshold?: number;
  /** Source of the report timestamp */
  clock?: () => Date;
}

/**
 * Main entry point for validating a utility consumption file.
 * Orchestrates the pipeline: load, schema gate, then the best-effort checks.
 */
export class UtilityDataValidator {
  /**
   * Validates one file and returns its report.
   *
   * Data problems never throw: they become findings. Only caller mistakes
   * (inconsistent thresholds) and unreadable files are thrown.
   */
  static validate(inputFile: string, options: ValidationOptions = {}): ValidationReport {
    const thresholds = UtilityDataValidator.resolveThresholds(options);
    const clock = options.clock ?? (() => new Date());
    const findings = new FindingCollector();

    logger.info(`Starting validation of ${inputFile}`);

    const finish = (rowsProcessed: number): ValidationReport => {
      const report = ValidationReportBuilder.build({
        inputFile,
        findings,
        rowsProcessed,
        timestamp: clock(),
      });
      UtilityDataValidator.logSummary(report);
      return report;
    };

    // Step 1: Load the file (critical)
    const loaded = UtilityTableLoader.loadFile(inputFile);
    if (!loaded.ok) {
      findings.addError(loaded.finding);
      return finish(0);
    }

    const table = new UtilityTable(loaded.table);

    // Step 2: Schema gate (critical)
    if (!SchemaValidator.validateColumns(table, findings)) {
      return finish(table.rowCount);
    }

    // Step 3: Best-effort data quality checks
    RowQualityValidator.pruneEmptyRows(table, findings);
    RowQualityValidator.checkDuplicateRows(table, findings);
    TemporalValidator.validateDates(table, findings);
    NumericValidator.validateColumns(table, findings, thresholds);

    return finish(table.rowCount);
  }

  private static resolveThresholds(options: ValidationOptions): ValueThresholds {
    const minValueThreshold = options.minValueThreshold ?? config.validation.minValueThreshold;
    const maxValueThreshold = options.maxValueThreshold ?? config.validation.maxValueThreshold;

    if (Number.isNaN(minValueThreshold) || Number.isNaN(maxValueThreshold)) {
      throw new ValidationError('Value thresholds must be numbers', { minValueThreshold, maxValueThreshold });
    }
    if (minValueThreshold > maxValueThreshold) {
      throw new ValidationError(
        `Minimum threshold ${minValueThreshold} is greater than maximum threshold ${maxValueThreshold}`,
        { minValueThreshold, maxValueThreshold }
      );
    }

    return { minValueThreshold, maxValueThreshold };
  }

  private static logSummary(report: ValidationReport): void {
    logger.info('='.repeat(60));
    logger.info('VALIDATION SUMMARY');
    logger.info('='.repeat(60));
    logger.info(`Status: ${report.validation_status}`);
    logger.info(`Total Errors: ${report.summary.total_errors}`);
    logger.info(`Total Warnings: ${report.summary.total_warnings}`);
    logger.info(`Rows Processed: ${report.summary.rows_processed}`);
    logger.info('='.repeat(60));
  }
}
