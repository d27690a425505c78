import { PropBounds } from './PropBounds';

/**
 * One source of run settings (CLI flags, YAML file, environment).
 * `undefined` means "not set here"; for `endKeyword`, `null` means read to end of file.
 */
export interface ConfLayer {
  logFile?: string;
  startKeyword?: string;
  endKeyword?: string | null;
  skipSections?: number;
  props?: string[];
  bounds?: PropBounds;
  listProps?: boolean;
  stats?: boolean;
  outputFolder?: string;
  csvFile?: string;
  excelFile?: string;
  sheetName?: string;
}
