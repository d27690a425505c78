import * as XLSX from 'xlsx';
import * as path from 'path';
import * as fs from 'fs';

export class ExcelGenerator {
  /**
   * Saves a selection of thermo properties as a single-sheet Excel workbook.
   * @param headers Column names, written as the first row.
   * @param data The selected rows, written as numeric cells.
   * @param filePath The path where the Excel file will be saved.
   * @param sheetName Name of the worksheet.
   * @returns The resolved path of the written workbook.
   */
  static generateExcelFile(
    headers: readonly string[],
    data: readonly (readonly number[])[],
    filePath: string,
    sheetName: string
  ): string {
    try {
      const workbook = XLSX.utils.book_new();

      const worksheetData: (string | number)[][] = [[...headers]];
      for (const row of data) {
        worksheetData.push([...row]);
      }

      const worksheet = XLSX.utils.aoa_to_sheet(worksheetData);
      XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);

      const resolvedPath = path.resolve(filePath);
      fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
      XLSX.writeFile(workbook, resolvedPath);

      console.log(`Excel file successfully generated at: ${resolvedPath}`);
      return resolvedPath;
    } catch (error) {
      console.error('Error generating Excel file:', error instanceof Error ? error.message : error);
      throw error;
    }
  }
}
