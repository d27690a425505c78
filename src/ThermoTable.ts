import { ScanConf } from './model/ScanConf';
import { ThermoBlock } from './model/ThermoBlock';
import { PropBounds, REFERENCE_COLUMNS } from './model/PropBounds';
import { LogBlockScanner } from './processor/LogBlockScanner';
import { LogFileReader } from './reader/LogFileReader';
import { BoundsRangeError, ParseError, UnknownColumnError } from './errors/ThermoError';

/**
 * Thermo data of one block of a LAMMPS log, addressable by property name.
 * Instances never change once constructed; loading again gives a new table.
 */
export class ThermoTable {
  private readonly headerNames: readonly string[];
  private readonly columnIndex: ReadonlyMap<string, number>;
  private readonly rows: readonly (readonly number[])[];

  constructor(block: ThermoBlock) {
    const columnIndex = new Map<string, number>();
    block.headerNames.forEach((name, index) => {
      if (columnIndex.has(name)) {
        throw new ParseError(`Duplicate thermo property "${name}" in header`, { column: name });
      }
      columnIndex.set(name, index);
    });

    block.data.forEach((row, index) => {
      if (row.length !== block.headerNames.length) {
        throw new ParseError(
          `Row ${index} has ${row.length} values, expected ${block.headerNames.length}`
        );
      }
    });

    this.headerNames = Object.freeze([...block.headerNames]);
    this.columnIndex = columnIndex;
    this.rows = Object.freeze(block.data.map(row => Object.freeze([...row])));
  }

  /**
   * Reads a log file and builds the table from the selected thermo block.
   * @param filePath Path to the LAMMPS log file.
   * @param scanConf Keywords and block selection; defaults to `Step` ... `Loop`, first block.
   */
  static load(filePath: string, scanConf: ScanConf = new ScanConf()): ThermoTable {
    const lines = LogFileReader.readLines(filePath);
    return new ThermoTable(LogBlockScanner.scan(lines, scanConf));
  }

  static fromText(text: string, scanConf: ScanConf = new ScanConf()): ThermoTable {
    return new ThermoTable(LogBlockScanner.scan(LogFileReader.splitLines(text), scanConf));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get columnCount(): number {
    return this.headerNames.length;
  }

  availableProps(): readonly string[] {
    return this.headerNames;
  }

  /**
   * Selects columns, in the requested order, optionally windowed on `Step` or `Time`.
   * A single name is treated as a one-element list, so the result is always rows x names.
   */
  prop(names: string | readonly string[], bounds?: PropBounds): number[][] {
    const requested = typeof names === 'string' ? [names] : names;
    const indices = requested.map(name => this.indexOf(name));
    const selected = bounds === undefined ? this.rows : this.rowsWithin(bounds);
    return selected.map(row => indices.map(index => row[index]));
  }

  private indexOf(name: string): number {
    const index = this.columnIndex.get(name);
    if (index === undefined) {
      throw new UnknownColumnError(name, this.headerNames);
    }
    return index;
  }

  private rowsWithin(bounds: PropBounds): readonly (readonly number[])[] {
    const column = REFERENCE_COLUMNS[bounds.reference];
    const index = this.columnIndex.get(column);
    if (index === undefined) {
      throw new BoundsRangeError(column);
    }
    const { start, end } = bounds;
    return this.rows.filter(row => {
      const value = row[index];
      return (start === undefined || value >= start) && (end === undefined || value <= end);
    });
  }
}
