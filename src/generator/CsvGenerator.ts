import * as fs from 'fs';
import * as path from 'path';
import { CsvProcessor } from '../processor/CsvProcessor';

export class CsvGenerator {
  /**
   * Writes a selection of thermo properties to a CSV file.
   * @param headers Column names of the selection.
   * @param data The selected rows.
   * @param outputFolder The folder where the CSV file will be saved.
   * @param fileName Name of the CSV file.
   * @returns The path of the written file.
   */
  static generateCsvFile(
    headers: readonly string[],
    data: readonly (readonly number[])[],
    outputFolder: string,
    fileName: string
  ): string {
    try {
      if (!fs.existsSync(outputFolder)) {
        fs.mkdirSync(outputFolder, { recursive: true });
      }

      const csvContent = CsvProcessor.generateCSV(headers, data);
      const outputFilePath = path.join(outputFolder, fileName);
      fs.writeFileSync(outputFilePath, csvContent, 'utf8');

      console.log(`Generated CSV file ${outputFilePath}`);
      return outputFilePath;
    } catch (error) {
      console.error('Error generating CSV file:', error instanceof Error ? error.message : error);
      throw error;
    }
  }
}
