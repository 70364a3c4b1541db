import Papa from 'papaparse';
import fs from 'fs';
import { logger } from '../../../config/logger';
import { DELIMITER_CANDIDATES, type Delimiter } from '../../../constants/utilityColumns';
import { FileAccessError, errorMessage } from '../../../errors';
import type { LoadedTable } from '../../../types/utilityData';
import type { FileNotFoundFinding, InvalidFileFormatFinding } from '../../../types/validationReport';
import { StringUtils } from '../../../utils/stringUtils';

export type LoadResult =
  | { ok: true; table: LoadedTable }
  | { ok: false; finding: FileNotFoundFinding | InvalidFileFormatFinding };

/**
 * Reads a delimited utility file of unknown dialect into a table
 */
export class UtilityTableLoader {
  /**
   * Loads a file from disk.
   * A missing file or an unparseable layout becomes a critical finding;
   * a file that exists but cannot be read is thrown as FileAccessError.
   */
  static loadFile(filePath: string): LoadResult {
    logger.info(`Loading utility file: ${filePath}`);

    if (!fs.existsSync(filePath)) {
      return {
        ok: false,
        finding: {
          type: 'FileNotFound',
          message: `Input file not found: ${filePath}`,
          severity: 'critical',
        },
      };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new FileAccessError(filePath, errorMessage(error));
    }

    const table = UtilityTableLoader.parseContent(content);
    if (!table) {
      return {
        ok: false,
        finding: {
          type: 'InvalidFileFormat',
          message: 'Failed to load CSV file with any standard delimiter',
          severity: 'critical',
        },
      };
    }

    logger.info(`Successfully loaded CSV with delimiter ${JSON.stringify(table.delimiter)}`);
    logger.info(`Detected columns: ${table.columns.join(', ')}`);
    logger.info(`Total rows: ${table.rows.length}`);

    return { ok: true, table };
  }

  /**
   * Tries each candidate delimiter in priority order and keeps the first
   * that yields more than one column
   */
  static parseContent(content: string): LoadedTable | null {
    const text = content.replace(/^\uFEFF/, '');

    for (const delimiter of DELIMITER_CANDIDATES) {
      const table = UtilityTableLoader.parseWithDelimiter(text, delimiter);
      if (table) {
        return table;
      }
    }

    return null;
  }

  /**
   * Parses the whole text with one delimiter.
   * Returns null when the layout is not structurally plausible: a single
   * column, no header line, an unterminated quote, or a data row wider
   * than the header. Narrower rows are padded with missing cells.
   */
  static parseWithDelimiter(text: string, delimiter: Delimiter): LoadedTable | null {
    const result = Papa.parse<string[]>(UtilityTableLoader.skipInitialSpace(text, delimiter), {
      delimiter,
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
      transform: (value: string) => value.trim(),
    });

    if (result.errors.some((error) => error.type === 'Quotes')) {
      logger.debug(`Delimiter ${JSON.stringify(delimiter)} rejected: unterminated quote`);
      return null;
    }

    // Blank lines never become rows
    const lines = result.data.filter((fields) => !(fields.length === 1 && fields[0] === ''));
    if (lines.length === 0) {
      return null;
    }

    const [header, ...records] = lines;
    if (header.length <= 1) {
      return null;
    }

    const overlong = records.findIndex((fields) => fields.length > header.length);
    if (overlong !== -1) {
      logger.debug(
        `Delimiter ${JSON.stringify(delimiter)} rejected: row ${overlong} has ` +
          `${records[overlong].length} fields, header has ${header.length}`
      );
      return null;
    }

    return {
      delimiter,
      columns: UtilityTableLoader.dedupeHeaders(header),
      rows: records.map((fields, index) => ({
        index,
        cells: header.map((_, position) => StringUtils.toCell(fields[position])),
      })),
    };
  }

  /**
   * Drops the blanks between a delimiter (or line start) and an opening
   * quote, so `5, "a, b"` reads as two fields. Blanks before unquoted
   * fields are left to the cell trim.
   */
  static skipInitialSpace(text: string, delimiter: Delimiter): string {
    const separator = delimiter === '|' ? '\\|' : delimiter;
    const blanks = delimiter === '\t' ? ' +' : '[ \\t]+';
    return text.replace(new RegExp(`(^|${separator})${blanks}(?=")`, 'gm'), '$1');
  }

  /**
   * Blank header names become "Unnamed: <position>"; repeated names get a
   * ".1", ".2"... suffix so every column stays addressable
   */
  private static dedupeHeaders(header: string[]): string[] {
    const seen = new Map<string, number>();

    return header.map((raw, position) => {
      const name = raw === '' ? `Unnamed: ${position}` : raw;
      const count = seen.get(name) ?? 0;
      seen.set(name, count + 1);
      return count === 0 ? name : `${name}.${count}`;
    });
  }
}
