export const DEFAULT_SHEET_NAME = 'thermo';

export class OutputConf {
  folder: string;
  csvFile?: string;
  excelFile?: string;
  sheetName: string;

  constructor(folder: string = './', csvFile?: string, excelFile?: string, sheetName: string = DEFAULT_SHEET_NAME) {
    this.folder = folder;
    this.csvFile = csvFile;
    this.excelFile = excelFile;
    this.sheetName = sheetName;
  }
}
