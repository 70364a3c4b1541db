import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../../config/logger';
import { ReportPersistenceError, errorMessage } from '../../../errors';
import { DateUtils } from '../../../utils/dateUtils';

/**
 * Persists reports and generated documents as pretty-printed JSON
 */
export class ReportWriter {
  /**
   * Writes any JSON-serializable document, creating the parent directory
   */
  static async writeJson(data: unknown, outputPath: string): Promise<string> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new ReportPersistenceError(outputPath, errorMessage(error));
    }

    logger.info(`Report saved to ${outputPath}`);
    return outputPath;
  }

  /**
   * Timestamped default location: <dir>/validation_report_YYYYMMDD_HHMMSS.json
   */
  static defaultReportPath(directory: string, now: Date = new Date()): string {
    return path.join(directory, `validation_report_${DateUtils.fileStamp(now)}.json`);
  }
}
