import { ScanConf } from './ScanConf';
import { PropBounds } from './PropBounds';
import { OutputConf } from './OutputConf';

export class ExecConf {
  logFile: string;
  scanConf: ScanConf;
  /** Empty selects every column of the table. */
  props: string[];
  bounds?: PropBounds;
  listProps: boolean;
  stats: boolean;
  outputConf: OutputConf;

  constructor(
    logFile: string,
    scanConf: ScanConf,
    props: string[] = [],
    bounds?: PropBounds,
    listProps: boolean = false,
    stats: boolean = false,
    outputConf: OutputConf = new OutputConf()
  ) {
    this.logFile = logFile;
    this.scanConf = scanConf;
    this.props = props;
    this.bounds = bounds;
    this.listProps = listProps;
    this.stats = stats;
    this.outputConf = outputConf;
  }

  /** True when the selection itself is the command's standard output. */
  printsSelection(): boolean {
    return !this.listProps && !this.stats && !this.outputConf.csvFile && !this.outputConf.excelFile;
  }
}
