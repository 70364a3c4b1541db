/**
 * Utility data schema
 * Column names are matched exactly after trimming header whitespace
 */
export const REQUIRED_COLUMNS = ['Date', 'kWh', 'Therms', 'Demand'] as const;

export const DATE_COLUMN = 'Date';

export const NUMERIC_COLUMNS = ['kWh', 'Therms', 'Demand'] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

/**
 * Field delimiters tried in priority order; the first one that yields
 * more than one column wins. A file with a single real column therefore
 * never loads: a known limitation kept for compatibility.
 */
export const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const;

export type Delimiter = (typeof DELIMITER_CANDIDATES)[number];

/**
 * Cell contents treated as missing (after trimming)
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

/**
 * Caps on the structured payload of findings
 */
export const FINDING_LIMITS = {
  rowIndices: 10,
  examples: 5,
  missingMonths: 12,
} as const;

/**
 * Unit-mismatch heuristic: a value is an outlier when it is more than
 * `magnitudeFactor` times the median (or less than median / factor), and
 * the warning fires only while outliers are a strict minority of values.
 */
export const UNIT_MISMATCH = {
  magnitudeFactor: 100,
  maxOutlierShare: 0.5,
} as const;
