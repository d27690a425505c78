import * as path from 'path';
import { ExecConf } from '../model/ExecConf';
import { ExecResult } from '../model/ExecResult';
import { ThermoTable } from '../ThermoTable';
import { StatsProcessor } from './StatsProcessor';
import { CsvGenerator } from '../generator/CsvGenerator';
import { ExcelGenerator } from '../generator/ExcelGenerator';

export class ExecProcessor {
  /**
   * Loads the thermo block named by the configuration, selects the requested
   * properties and writes the configured outputs.
   * @param execConf The execution configuration.
   */
  static process(execConf: ExecConf): ExecResult {
    // Progress goes to stdout only when stdout is not carrying the selection
    const log = execConf.printsSelection() ? console.error : console.log;

    // 1. Load
    log(`Loading thermo block ${execConf.scanConf.skipSections + 1} from "${execConf.logFile}"`);
    const table = ThermoTable.load(execConf.logFile, execConf.scanConf);
    log(`Loaded ${table.rowCount} rows x ${table.columnCount} properties.`);

    // 2. Selection
    const props = execConf.props.length > 0 ? [...execConf.props] : [...table.availableProps()];
    const selection = table.prop(props, execConf.bounds);
    if (execConf.bounds !== undefined) {
      log(`Selected ${selection.length} of ${table.rowCount} rows within ${execConf.bounds.reference} bounds.`);
    }

    const result: ExecResult = { table, props, selection, outputFiles: [] };

    // 3. Stats
    if (execConf.stats) {
      result.stats = StatsProcessor.summarize(table, props, execConf.bounds);
    }

    // 4. Outputs
    const { outputConf } = execConf;
    if (outputConf.csvFile) {
      result.outputFiles.push(CsvGenerator.generateCsvFile(props, selection, outputConf.folder, outputConf.csvFile));
    }
    if (outputConf.excelFile) {
      const excelPath = path.join(outputConf.folder, outputConf.excelFile);
      result.outputFiles.push(ExcelGenerator.generateExcelFile(props, selection, excelPath, outputConf.sheetName));
    }

    return result;
  }
}
