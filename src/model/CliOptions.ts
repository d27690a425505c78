// Shape of `program.opts()` for the thermo-log command.
export type CliOptions = {
  logFile?: string;
  confFile?: string;
  startKeyword?: string;
  endKeyword?: string;
  readToEnd?: boolean;
  skipSections?: string;
  props?: string[];
  step?: string;
  time?: string;
  list?: boolean;
  stats?: boolean;
  outputFolder?: string;
  csv?: string;
  excel?: string;
  sheetName?: string;
};
