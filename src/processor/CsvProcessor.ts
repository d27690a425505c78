import * as Papa from 'papaparse';

export class CsvProcessor {
  /**
   * Generates a CSV string from headers and numeric rows using PapaParse.
   * @param headers The headers for the CSV file.
   * @param data The data rows for the CSV file.
   * @returns A CSV string without a trailing newline.
   */
  static generateCSV(headers: readonly string[], data: readonly (readonly number[])[]): string {
    const csvData = [[...headers], ...data.map(row => row.map(value => String(value)))];

    return Papa.unparse(csvData, {
      quotes: false,
      delimiter: ',',
      newline: '\n',
    });
  }
}
