import type { Delimiter } from '../constants/utilityColumns';

/**
 * A cell after loading: trimmed text, or null when blank / a null marker
 */
export type Cell = string | null;

/**
 * One data row. `index` is the row's 0-based position in the file as loaded
 * (header excluded) and never changes, so findings keep pointing at the
 * same row after empty rows are pruned.
 */
export interface UtilityRow {
  index: number;
  cells: Cell[];
}

/**
 * Raw table as produced by the loader
 */
export interface LoadedTable {
  delimiter: Delimiter;
  columns: string[];
  rows: UtilityRow[];
}
