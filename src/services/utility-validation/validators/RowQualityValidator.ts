import { logger } from '../../../config/logger';
import { FINDING_LIMITS } from '../../../constants/utilityColumns';
import type { UtilityRow } from '../../../types/utilityData';
import type { FindingCollector } from '../FindingCollector';
import type { UtilityTable } from '../UtilityTable';

/**
 * Row-level quality checks: empty rows and exact duplicates
 */
export class RowQualityValidator {
  /**
   * Warns about rows where every cell is missing, then removes them from
   * the table so later stages never see them
   */
  static pruneEmptyRows(table: UtilityTable, findings: FindingCollector): void {
    logger.info('Checking for empty rows...');

    const emptyRows = table.rows.filter(RowQualityValidator.isEmptyRow).length;
    if (emptyRows === 0) {
      return;
    }

    findings.addWarning({
      type: 'EmptyRows',
      message: `Found ${emptyRows} completely empty rows - will be ignored`,
      count: emptyRows,
    });

    table.removeRows(RowQualityValidator.isEmptyRow);
    logger.info(`Removed ${emptyRows} empty rows`);
  }

  /**
   * Two rows are duplicates when every column (not only the required ones)
   * holds the same value; missing cells compare equal.
   *
   * `count` is the number of rows repeating an earlier row. `row_indices`
   * lists every row taking part in a duplicate group, first occurrences
   * included, in row order.
   */
  static checkDuplicateRows(table: UtilityTable, findings: FindingCollector): void {
    logger.info('Checking for duplicate rows...');

    const groups = new Map<string, number[]>();
    for (const row of table.rows) {
      const key = JSON.stringify(row.cells);
      const group = groups.get(key);
      if (group) {
        group.push(row.index);
      } else {
        groups.set(key, [row.index]);
      }
    }

    let duplicateCount = 0;
    const participating = new Set<number>();
    for (const indices of groups.values()) {
      if (indices.length > 1) {
        duplicateCount += indices.length - 1;
        indices.forEach((index) => participating.add(index));
      }
    }

    if (duplicateCount === 0) {
      return;
    }

    const rowIndices = table.rows
      .map((row) => row.index)
      .filter((index) => participating.has(index))
      .slice(0, FINDING_LIMITS.rowIndices);

    findings.addError({
      type: 'DuplicateRows',
      message: `Found ${duplicateCount} duplicate rows`,
      count: duplicateCount,
      row_indices: rowIndices,
      severity: 'high',
    });
  }

  private static isEmptyRow(row: UtilityRow): boolean {
    return row.cells.every((cell) => cell === null);
  }
}
