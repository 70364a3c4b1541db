import { logger } from '../../../config/logger';
import {
  FINDING_LIMITS,
  NUMERIC_COLUMNS,
  UNIT_MISMATCH,
  type NumericColumn,
} from '../../../constants/utilityColumns';
import type { ValueThresholds } from '../../../types/validationReport';
import { NumberUtils } from '../../../utils/numberUtils';
import type { FindingCollector } from '../FindingCollector';
import type { UtilityTable } from '../UtilityTable';

/**
 * Checks for the kWh, Therms and Demand columns.
 * Columns are independent: a problem in one never stops the others.
 */
export class NumericValidator {
  static validateColumns(
    table: UtilityTable,
    findings: FindingCollector,
    thresholds: ValueThresholds
  ): void {
    logger.info('Validating numeric columns...');

    for (const column of NUMERIC_COLUMNS) {
      NumericValidator.validateColumn(table, column, findings, thresholds);
    }
  }

  static validateColumn(
    table: UtilityTable,
    column: NumericColumn,
    findings: FindingCollector,
    thresholds: ValueThresholds
  ): void {
    NumericValidator.checkMissingData(table, column, findings);

    if (!NumericValidator.coerceColumn(table, column, findings)) {
      return;
    }

    NumericValidator.checkValueRange(table, column, findings, thresholds);
    NumericValidator.detectUnitMismatch(table, column, findings);
  }

  /**
   * Counts blank cells on the raw column
   */
  static checkMissingData(table: UtilityTable, column: NumericColumn, findings: FindingCollector): void {
    const cells = table.column(column);
    const missingIndices = table.rows
      .filter((_, position) => cells[position] === null)
      .map((row) => row.index);

    if (missingIndices.length === 0) {
      return;
    }

    const percentage = NumberUtils.round(NumberUtils.percentage(missingIndices.length, table.rowCount), 2);

    findings.addError({
      type: 'MissingData',
      message: `Column '${column}' has ${missingIndices.length} missing values (${percentage.toFixed(2)}%)`,
      column,
      count: missingIndices.length,
      percentage,
      row_indices: missingIndices.slice(0, FINDING_LIMITS.rowIndices),
      severity: 'high',
    });
  }

  /**
   * Parses every non-missing cell. When any cell is non-numeric an error
   * is recorded and no numeric column is attached, which skips the range
   * and unit checks for this column.
   *
   * @returns true when the numeric column was attached
   */
  static coerceColumn(table: UtilityTable, column: NumericColumn, findings: FindingCollector): boolean {
    const cells = table.column(column);
    const values: (number | null)[] = [];
    const nonNumeric: string[] = [];

    for (const cell of cells) {
      if (cell === null) {
        values.push(null);
        continue;
      }
      const value = NumberUtils.parseNumber(cell);
      if (value === null) {
        nonNumeric.push(cell);
      }
      values.push(value);
    }

    if (nonNumeric.length > 0) {
      findings.addError({
        type: 'NonNumericValues',
        message: `Column '${column}' has ${nonNumeric.length} non-numeric values`,
        column,
        count: nonNumeric.length,
        examples: nonNumeric.slice(0, FINDING_LIMITS.examples),
        severity: 'high',
      });
      return false;
    }

    table.setNumericColumn(column, values);
    return true;
  }

  /**
   * Values below the minimum threshold are errors; values above the
   * maximum threshold are warnings
   */
  static checkValueRange(
    table: UtilityTable,
    column: NumericColumn,
    findings: FindingCollector,
    thresholds: ValueThresholds
  ): void {
    const values = table.numericColumn(column);
    if (!values) {
      return;
    }

    const belowMin: { index: number; value: number }[] = [];
    const aboveMax: number[] = [];

    values.forEach((value, position) => {
      if (value === null) return;
      if (value < thresholds.minValueThreshold) {
        belowMin.push({ index: table.rows[position].index, value });
      }
      if (value > thresholds.maxValueThreshold) {
        aboveMax.push(value);
      }
    });

    if (belowMin.length > 0) {
      findings.addError({
        type: 'NegativeValues',
        message: `Column '${column}' has ${belowMin.length} negative values`,
        column,
        count: belowMin.length,
        examples: belowMin.slice(0, FINDING_LIMITS.examples).map((entry) => NumberUtils.toReportable(entry.value)),
        row_indices: belowMin.slice(0, FINDING_LIMITS.rowIndices).map((entry) => entry.index),
        severity: 'high',
      });
    }

    if (aboveMax.length > 0) {
      findings.addWarning({
        type: 'ExtremeValues',
        message: `Column '${column}' has ${aboveMax.length} extremely high values (>${thresholds.maxValueThreshold})`,
        column,
        count: aboveMax.length,
        examples: aboveMax.slice(0, FINDING_LIMITS.examples).map((value) => NumberUtils.toReportable(value)),
        threshold: thresholds.maxValueThreshold,
      });
    }
  }

  /**
   * Flags a minority of values more than two orders of magnitude away
   * from the median, the usual sign of a few readings entered in the
   * wrong unit (MWh instead of kWh). Skipped for fewer than two values,
   * a zero mean, a zero standard deviation or a non-positive median.
   */
  static detectUnitMismatch(table: UtilityTable, column: NumericColumn, findings: FindingCollector): void {
    const derived = table.numericColumn(column);
    if (!derived) {
      return;
    }

    const values = derived.filter((value): value is number => value !== null);
    if (values.length < 2) {
      return;
    }

    const mean = NumberUtils.mean(values);
    const stdDev = NumberUtils.sampleStdDev(values);
    if (stdDev === 0 || mean === 0) {
      return;
    }

    const median = NumberUtils.median(values);
    if (!(median > 0)) {
      return;
    }

    const { magnitudeFactor, maxOutlierShare } = UNIT_MISMATCH;
    const outliers = values.filter(
      (value) => value > median * magnitudeFactor || value < median / magnitudeFactor
    );

    if (outliers.length === 0 || outliers.length >= values.length * maxOutlierShare) {
      return;
    }

    findings.addWarning({
      type: 'PotentialUnitMismatch',
      message: `Column '${column}' may have unit mismatches - ${outliers.length} values differ significantly from median`,
      column,
      count: outliers.length,
      median,
      examples: outliers.slice(0, FINDING_LIMITS.examples).map((value) => NumberUtils.toReportable(value)),
    });
  }
}
