/**
 * Date utility functions for parsing utility billing dates
 * All dates are created in UTC so month arithmetic never shifts with the host timezone
 */

export class DateUtils {
  private static readonly MONTHS: Record<string, number> = {
    jan: 0, january: 0,
    feb: 1, february: 1,
    mar: 2, march: 2,
    apr: 3, april: 3,
    may: 4,
    jun: 5, june: 5,
    jul: 6, july: 6,
    aug: 7, august: 7,
    sep: 8, sept: 8, september: 8,
    oct: 9, october: 9,
    nov: 10, november: 10,
    dec: 11, december: 11,
  };

  private static readonly TIME_SUFFIX =
    '(?:[T ](\\d{1,2}):(\\d{2})(?::(\\d{2})(?:\\.\\d+)?)?(?:Z|[+-]\\d{2}:?\\d{2})?)?';

  /**
   * Parses a calendar date in any of the common billing-export formats.
   * Returns null for anything that is not a real calendar date.
   */
  static parseDate(dateStr: string | null | undefined): Date | null {
    if (!dateStr) return null;

    const cleanDate = dateStr.trim();
    if (!cleanDate) return null;

    // 1. ISO: YYYY-MM-DD or YYYY/MM/DD, optionally with a time part
    const isoMatch = new RegExp(`^(\\d{4})[-/](\\d{1,2})[-/](\\d{1,2})${this.TIME_SUFFIX}$`).exec(cleanDate);
    if (isoMatch) {
      if (!this.isValidTime(isoMatch[4], isoMatch[5], isoMatch[6])) return null;
      return this.createUTCDate(Number(isoMatch[1]), Number(isoMatch[2]) - 1, Number(isoMatch[3]));
    }

    // 2. Year-month: YYYY-MM (first of month)
    const yearMonthMatch = /^(\d{4})[-/](\d{1,2})$/.exec(cleanDate);
    if (yearMonthMatch) {
      return this.createUTCDate(Number(yearMonthMatch[1]), Number(yearMonthMatch[2]) - 1, 1);
    }

    // 3. Compact: YYYYMMDD
    const compactMatch = /^(\d{4})(\d{2})(\d{2})$/.exec(cleanDate);
    if (compactMatch) {
      return this.createUTCDate(Number(compactMatch[1]), Number(compactMatch[2]) - 1, Number(compactMatch[3]));
    }

    // 4. US: MM/DD/YYYY, optionally with a time part (falls back to DD/MM/YYYY when the first part cannot be a month)
    const usMatch = new RegExp(`^(\\d{1,2})[-/.](\\d{1,2})[-/.](\\d{2}|\\d{4})${this.TIME_SUFFIX}$`).exec(cleanDate);
    if (usMatch) {
      if (!this.isValidTime(usMatch[4], usMatch[5], usMatch[6])) return null;
      let month = Number(usMatch[1]);
      let day = Number(usMatch[2]);
      if (month > 12 && day <= 12) {
        [month, day] = [day, month];
      }
      return this.createUTCDate(this.expandYear(usMatch[3]), month - 1, day);
    }

    // 5. DD-Mon-YYYY, DD Mon YYYY, DD/Mon/YY
    const dayMonthYearMatch = new RegExp(
      `^(\\d{1,2})[-/\\s]([A-Za-z]+)\\.?[-/\\s,]+(\\d{2}|\\d{4})${this.TIME_SUFFIX}$`
    ).exec(cleanDate);
    if (dayMonthYearMatch) {
      if (!this.isValidTime(dayMonthYearMatch[4], dayMonthYearMatch[5], dayMonthYearMatch[6])) return null;
      const month = this.MONTHS[dayMonthYearMatch[2].toLowerCase()];
      if (month === undefined) return null;
      return this.createUTCDate(this.expandYear(dayMonthYearMatch[3]), month, Number(dayMonthYearMatch[1]));
    }

    // 6. Mon DD, YYYY or Mon-DD-YYYY
    const monthDayYearMatch = new RegExp(
      `^([A-Za-z]+)\\.?[-/\\s]+(\\d{1,2}),?[-/\\s]+(\\d{4})${this.TIME_SUFFIX}$`
    ).exec(cleanDate);
    if (monthDayYearMatch) {
      if (!this.isValidTime(monthDayYearMatch[4], monthDayYearMatch[5], monthDayYearMatch[6])) return null;
      const month = this.MONTHS[monthDayYearMatch[1].toLowerCase()];
      if (month === undefined) return null;
      return this.createUTCDate(Number(monthDayYearMatch[3]), month, Number(monthDayYearMatch[2]));
    }

    // 7. Month YYYY (first of month)
    const monthYearMatch = /^([A-Za-z]+)\.?[-/\s,]+(\d{4})$/.exec(cleanDate);
    if (monthYearMatch) {
      const month = this.MONTHS[monthYearMatch[1].toLowerCase()];
      if (month === undefined) return null;
      return this.createUTCDate(Number(monthYearMatch[2]), month, 1);
    }

    return null;
  }

  /**
   * Formats the calendar month of a date as YYYY-MM
   */
  static formatMonth(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${year}-${month}`;
  }

  /**
   * Formats a date to YYYY-MM-DD
   */
  static formatDate(date: Date): string {
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${this.formatMonth(date)}-${day}`;
  }

  /**
   * Every calendar month from the month of `start` to the month of `end`,
   * inclusive, as YYYY-MM labels in chronological order
   */
  static monthSequence(start: Date, end: Date): string[] {
    const months: string[] = [];
    let year = start.getUTCFullYear();
    let month = start.getUTCMonth();
    const endYear = end.getUTCFullYear();
    const endMonth = end.getUTCMonth();

    while (year < endYear || (year === endYear && month <= endMonth)) {
      months.push(this.formatMonth(new Date(Date.UTC(year, month, 1))));
      month++;
      if (month === 12) {
        month = 0;
        year++;
      }
    }

    return months;
  }

  /**
   * Formats a timestamp as YYYYMMDD_HHMMSS (local time) for file names
   */
  static fileStamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }

  private static expandYear(year: string): number {
    const value = Number(year);
    if (year.length === 4) return value;
    return value < 50 ? 2000 + value : 1900 + value;
  }

  // Rejects dates that roll over (e.g. 2024-02-30)
  private static createUTCDate(year: number, month: number, day: number): Date | null {
    if (month < 0 || month > 11 || day < 1 || day > 31) return null;
    const date = new Date(Date.UTC(year, month, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
      return null;
    }
    return date;
  }

  private static isValidTime(hours?: string, minutes?: string, seconds?: string): boolean {
    if (hours === undefined) return true;
    return Number(hours) < 24 && Number(minutes) < 60 && (seconds === undefined || Number(seconds) < 60);
  }
}
