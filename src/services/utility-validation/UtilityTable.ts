import type { Delimiter } from '../../constants/utilityColumns';
import type { Cell, LoadedTable, UtilityRow } from '../../types/utilityData';

/**
 * Table owned by a single validation run.
 *
 * Stages mutate it in place: the schema check normalizes header names, the
 * row checks prune empty rows, and the temporal and numeric checks attach
 * derived typed columns aligned with the current rows.
 */
export class UtilityTable {
  readonly delimiter: Delimiter;
  private columnNames: string[];
  private dataRows: UtilityRow[];
  private derivedDates: Date[] | null = null;
  private readonly derivedNumbers = new Map<string, (number | null)[]>();

  constructor(loaded: LoadedTable) {
    this.delimiter = loaded.delimiter;
    this.columnNames = [...loaded.columns];
    this.dataRows = loaded.rows;
  }

  get columns(): readonly string[] {
    return this.columnNames;
  }

  get rows(): readonly UtilityRow[] {
    return this.dataRows;
  }

  get rowCount(): number {
    return this.dataRows.length;
  }

  hasColumn(name: string): boolean {
    return this.columnNames.includes(name);
  }

  renameColumns(rename: (name: string) => string): void {
    this.columnNames = this.columnNames.map(rename);
  }

  /**
   * Cells of the first column with this name, aligned with `rows`
   */
  column(name: string): Cell[] {
    const position = this.columnNames.indexOf(name);
    if (position === -1) {
      throw new Error(`Unknown column: ${name}`);
    }
    return this.dataRows.map((row) => row.cells[position] ?? null);
  }

  /**
   * Physically removes matching rows. Derived columns are dropped because
   * they would no longer line up with the rows.
   */
  removeRows(predicate: (row: UtilityRow) => boolean): number {
    const before = this.dataRows.length;
    this.dataRows = this.dataRows.filter((row) => !predicate(row));
    const removed = before - this.dataRows.length;
    if (removed > 0) {
      this.derivedDates = null;
      this.derivedNumbers.clear();
    }
    return removed;
  }

  setParsedDates(dates: Date[]): void {
    this.assertAligned(dates.length);
    this.derivedDates = dates;
  }

  get parsedDates(): readonly Date[] | null {
    return this.derivedDates;
  }

  setNumericColumn(name: string, values: (number | null)[]): void {
    this.assertAligned(values.length);
    this.derivedNumbers.set(name, values);
  }

  numericColumn(name: string): readonly (number | null)[] | null {
    return this.derivedNumbers.get(name) ?? null;
  }

  private assertAligned(length: number): void {
    if (length !== this.dataRows.length) {
      throw new Error(`Derived column has ${length} values for ${this.dataRows.length} rows`);
    }
  }
}
