import { logger } from '../../../config/logger';
import { DATE_COLUMN, FINDING_LIMITS } from '../../../constants/utilityColumns';
import type { Cell } from '../../../types/utilityData';
import { DateUtils } from '../../../utils/dateUtils';
import type { FindingCollector } from '../FindingCollector';
import type { UtilityTable } from '../UtilityTable';

/**
 * Date parsing and month-continuity checks
 */
export class TemporalValidator {
  /**
   * Parses the Date column. Any unparseable (or missing) cell is an
   * InvalidDates error and no parsed column is kept; otherwise the parsed
   * dates are attached to the table and month gaps are checked.
   */
  static validateDates(table: UtilityTable, findings: FindingCollector): void {
    logger.info('Validating Date column...');

    const cells = table.column(DATE_COLUMN);
    const parsed: Date[] = [];
    const invalid: Cell[] = [];

    for (const cell of cells) {
      const date = DateUtils.parseDate(cell);
      if (date) {
        parsed.push(date);
      } else {
        invalid.push(cell);
      }
    }

    if (invalid.length > 0) {
      findings.addError({
        type: 'InvalidDates',
        message: `Found ${invalid.length} invalid date entries`,
        count: invalid.length,
        examples: invalid.slice(0, FINDING_LIMITS.examples),
        severity: 'high',
      });
      return;
    }

    table.setParsedDates(parsed);
    logger.info('All dates successfully parsed');

    TemporalValidator.checkMissingMonths(parsed, findings);
  }

  /**
   * Every calendar month between the earliest and latest date must appear
   * at least once (compared by year and month, not by day). Needs two or
   * more dates; with fewer there is no range to check.
   */
  static checkMissingMonths(dates: readonly Date[], findings: FindingCollector): void {
    if (dates.length < 2) {
      return;
    }

    logger.info('Checking for missing months...');

    const sorted = [...dates].sort((a, b) => a.getTime() - b.getTime());
    const present = new Set(sorted.map((date) => DateUtils.formatMonth(date)));
    const expected = DateUtils.monthSequence(sorted[0], sorted[sorted.length - 1]);

    const missingMonths = expected.filter((month) => !present.has(month)).sort();
    if (missingMonths.length === 0) {
      return;
    }

    findings.addError({
      type: 'MissingMonths',
      message: `Found ${missingMonths.length} missing months in date sequence`,
      count: missingMonths.length,
      missing_months: missingMonths.slice(0, FINDING_LIMITS.missingMonths),
      severity: 'medium',
    });
  }
}
