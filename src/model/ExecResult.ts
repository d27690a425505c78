import { ThermoTable } from '../ThermoTable';
import { ColumnStats } from './ColumnStats';

export interface ExecResult {
  table: ThermoTable;
  props: string[];
  selection: number[][];
  stats?: ColumnStats[];
  outputFiles: string[];
}
