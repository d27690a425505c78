import { ThermoTable } from '../ThermoTable';
import { ColumnStats } from '../model/ColumnStats';
import { PropBounds } from '../model/PropBounds';

export class StatsProcessor {
  /**
   * Summarizes each requested property over the (optionally bounded) rows.
   * @param table The loaded thermo table.
   * @param names Properties to summarize, in output order.
   * @param bounds Optional step/time window.
   */
  static summarize(table: ThermoTable, names: readonly string[], bounds?: PropBounds): ColumnStats[] {
    const selection = table.prop(names, bounds);
    return names.map((name, column) => this.columnStats(name, selection.map(row => row[column])));
  }

  static columnStats(name: string, values: readonly number[]): ColumnStats {
    const count = values.length;
    if (count === 0) {
      return { name, count, mean: NaN, stdev: NaN, min: NaN, max: NaN };
    }
    const mean = this.mean(values);
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
    return {
      name,
      count,
      mean,
      stdev: count < 2 ? NaN : Math.sqrt(this.sumOfSquares(values, mean) / (count - 1)),
      min,
      max,
    };
  }

  /**
   * Renders stats as an aligned plain-text table, numbers to six significant digits.
   */
  static formatTable(stats: readonly ColumnStats[]): string {
    const rows = [
      ['Property', 'Count', 'Mean', 'Stdev', 'Min', 'Max'],
      ...stats.map(s => [s.name, String(s.count), ...[s.mean, s.stdev, s.min, s.max].map(v => this.formatNumber(v))]),
    ];
    const widths = rows[0].map((_, column) => Math.max(...rows.map(row => row[column].length)));
    return rows
      .map(row => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd())
      .join('\n');
  }

  private static formatNumber(value: number): string {
    return Number.isNaN(value) ? 'nan' : String(Number(value.toPrecision(6)));
  }

  private static mean(values: readonly number[]): number {
    let sum = 0;
    for (const value of values) sum += value;
    return sum / values.length;
  }

  private static sumOfSquares(values: readonly number[], mean: number): number {
    let acc = 0;
    for (const value of values) {
      const d = value - mean;
      acc += d * d;
    }
    return acc;
  }
}
