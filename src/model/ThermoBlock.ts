// src/model/ThermoBlock.ts

export interface ThermoBlock {
  headerNames: string[];
  data: number[][];
}
