export interface ColumnStats {
  name: string;
  count: number;
  mean: number;
  stdev: number;
  min: number;
  max: number;
}
