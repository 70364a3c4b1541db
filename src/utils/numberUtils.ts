/**
 * Number utility functions for parsing meter readings and column statistics
 */

export class NumberUtils {
  private static readonly DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
  private static readonly INFINITY_LITERAL = /^([+-]?)inf(inity)?$/i;

  /**
   * Parses a plain decimal literal. Thousands separators, currency symbols
   * and unit suffixes are rejected rather than stripped: a reading such as
   * "1,200 kWh" must surface as non-numeric.
   */
  static parseNumber(value: string | null | undefined): number | null {
    if (value === null || value === undefined) return null;

    const str = value.trim();
    if (str === '') return null;

    if (this.DECIMAL_LITERAL.test(str)) {
      return Number(str);
    }

    const infinity = this.INFINITY_LITERAL.exec(str);
    if (infinity) {
      return infinity[1] === '-' ? -Infinity : Infinity;
    }

    return null;
  }

  /**
   * A value as it can appear in a JSON report: non-finite numbers would
   * serialize as null, so they are spelled out the way they are parsed
   */
  static toReportable(value: number): number | string {
    if (Number.isFinite(value)) return value;
    if (Number.isNaN(value)) return 'nan';
    return value > 0 ? 'inf' : '-inf';
  }

  /**
   * Arithmetic mean (NaN for an empty list)
   */
  static mean(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }

  /**
   * Sample standard deviation (n - 1 denominator)
   */
  static sampleStdDev(values: readonly number[]): number {
    if (values.length < 2) return NaN;
    const avg = this.mean(values);
    const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
    return Math.sqrt(squared / (values.length - 1));
  }

  /**
   * Median; the mean of the two middle values for an even count
   */
  static median(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  }

  /**
   * Rounds a number to specified decimal places
   */
  static round(value: number, decimals: number = 2): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
  }

  /**
   * Calculates percentage
   */
  static percentage(value: number, total: number): number {
    if (total === 0) return 0;
    return (value / total) * 100;
  }
}
