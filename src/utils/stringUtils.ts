import { MISSING_VALUE_TOKENS } from '../constants/utilityColumns';

/**
 * String utility functions for cleaning cell values
 */

export class StringUtils {
  /**
   * Checks if a raw cell counts as missing (blank or a null marker such as "N/A")
   */
  static isMissing(value: string | null | undefined): boolean {
    if (value === null || value === undefined) return true;
    return MISSING_VALUE_TOKENS.has(value.trim());
  }

  /**
   * Normalizes a raw cell: trimmed text, or null when missing
   */
  static toCell(value: string | null | undefined): string | null {
    if (value === null || value === undefined || this.isMissing(value)) {
      return null;
    }
    return value.trim();
  }

  /**
   * Sanitizes a string for use in filenames
   */
  static sanitizeFilename(value: string): string {
    return value.replace(/[^a-zA-Z0-9._-]/g, '_').replace(/_{2,}/g, '_');
  }
}
