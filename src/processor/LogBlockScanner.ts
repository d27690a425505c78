import { ScanConf } from '../model/ScanConf';
import { ThermoBlock } from '../model/ThermoBlock';
import { NotFoundError, ParseError } from '../errors/ThermoError';

const DECIMAL_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_TOKEN = /^([+-]?)(nan|inf|infinity)$/i;

export class LogBlockScanner {
  /**
   * Extracts one thermo block from the lines of a log file.
   * @param lines The log file, one entry per line, in file order.
   * @param scanConf Start keyword, number of blocks to skip and end keyword.
   * @returns The header names and the numeric rows of the selected block.
   */
  static scan(lines: readonly string[], scanConf: ScanConf): ThermoBlock {
    const headerIndex = this.findHeaderIndex(lines, scanConf);
    const headerNames = this.tokenize(lines[headerIndex]);
    const dataEnd = this.findDataEnd(lines, headerIndex, scanConf.endKeyword);

    const data: number[][] = [];
    for (let i = headerIndex + 1; i < dataEnd; i++) {
      data.push(this.parseRow(lines[i], i + 1, headerNames.length));
    }

    if (data.length === 0) {
      console.warn(`Thermo block starting at line ${headerIndex + 1} has no data rows.`);
    }
    return { headerNames, data };
  }

  static tokenize(line: string): string[] {
    const trimmed = line.trim();
    return trimmed === '' ? [] : trimmed.split(/\s+/);
  }

  /**
   * Converts one token the way the log writes numbers, or returns null.
   */
  static parseNumber(token: string): number | null {
    if (DECIMAL_TOKEN.test(token)) {
      return Number(token);
    }
    const special = SPECIAL_TOKEN.exec(token);
    if (special === null) {
      return null;
    }
    if (special[2].toLowerCase() === 'nan') {
      return NaN;
    }
    return special[1] === '-' ? -Infinity : Infinity;
  }

  private static firstToken(line: string): string | undefined {
    return this.tokenize(line)[0];
  }

  private static findHeaderIndex(lines: readonly string[], scanConf: ScanConf): number {
    let found = 0;
    for (let i = 0; i < lines.length; i++) {
      if (this.firstToken(lines[i]) !== scanConf.startKeyword) {
        continue;
      }
      if (found === scanConf.skipSections) {
        return i;
      }
      found++;
    }
    throw new NotFoundError(
      `Start keyword "${scanConf.startKeyword}" occurrence ${scanConf.skipSections + 1} not found in log (found ${found})`,
      { keyword: scanConf.startKeyword }
    );
  }

  // Index one past the last data line.
  private static findDataEnd(lines: readonly string[], headerIndex: number, endKeyword: string | null): number {
    if (endKeyword === null) {
      return Math.max(headerIndex + 1, lines.length - 1);
    }
    for (let i = headerIndex + 1; i < lines.length; i++) {
      if (this.firstToken(lines[i]) === endKeyword) {
        return i;
      }
    }
    throw new NotFoundError(
      `End keyword "${endKeyword}" not found after header on line ${headerIndex + 1}`,
      { keyword: endKeyword, lineNumber: headerIndex + 1 }
    );
  }

  private static parseRow(line: string, lineNumber: number, columnCount: number): number[] {
    const tokens = this.tokenize(line);
    if (tokens.length !== columnCount) {
      throw new ParseError(
        `Line ${lineNumber} has ${tokens.length} fields, expected ${columnCount}: "${line}"`,
        { line, lineNumber }
      );
    }
    return tokens.map(token => {
      const value = this.parseNumber(token);
      if (value === null) {
        throw new ParseError(
          `Line ${lineNumber} has non-numeric field "${token}": "${line}"`,
          { line, lineNumber, value: token }
        );
      }
      return value;
    });
  }
}
