import { logger } from '../../../config/logger';
import { REQUIRED_COLUMNS } from '../../../constants/utilityColumns';
import type { FindingCollector } from '../FindingCollector';
import type { UtilityTable } from '../UtilityTable';

/**
 * Hard gate: the required columns must be present before any data check runs
 */
export class SchemaValidator {
  /**
   * Trims header names in place, then checks the required columns exist.
   * Order does not matter and extra columns are ignored.
   *
   * @returns false when a MissingColumns error was recorded
   */
  static validateColumns(table: UtilityTable, findings: FindingCollector): boolean {
    logger.info('Validating column structure...');

    table.renameColumns((name) => name.trim());

    const missingColumns = REQUIRED_COLUMNS.filter((column) => !table.hasColumn(column));

    if (missingColumns.length > 0) {
      findings.addError({
        type: 'MissingColumns',
        message: `Missing required columns: ${missingColumns.join(', ')}`,
        columns: missingColumns,
        severity: 'critical',
      });
      return false;
    }

    logger.info('All required columns present');
    return true;
  }
}
