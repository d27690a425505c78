export { ThermoTable } from './ThermoTable';
export { ScanConf, DEFAULT_START_KEYWORD, DEFAULT_END_KEYWORD } from './model/ScanConf';
export { ThermoBlock } from './model/ThermoBlock';
export { PropBounds, BoundsReference, REFERENCE_COLUMNS } from './model/PropBounds';
export { ColumnStats } from './model/ColumnStats';
export { LogBlockScanner } from './processor/LogBlockScanner';
export { LogFileReader } from './reader/LogFileReader';
export { StatsProcessor } from './processor/StatsProcessor';
export { CsvProcessor } from './processor/CsvProcessor';
export { CsvGenerator } from './generator/CsvGenerator';
export { ExcelGenerator } from './generator/ExcelGenerator';
export {
  ThermoError,
  ThermoErrorCategory,
  ThermoErrorDetail,
  NotFoundError,
  ParseError,
  UnknownColumnError,
  BoundsRangeError,
  ConfigError,
} from './errors/ThermoError';
