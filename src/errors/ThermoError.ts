// src/errors/ThermoError.ts
export enum ThermoErrorCategory {
  NotFound = 'NOT_FOUND',
  Parse = 'PARSE',
  UnknownColumn = 'UNKNOWN_COLUMN',
  Range = 'RANGE',
  Config = 'CONFIG',
}

export interface ThermoErrorDetail {
  keyword?: string;
  column?: string;
  line?: string;
  lineNumber?: number;
  filePath?: string;
  value?: string;
}

export class ThermoError extends Error {
  constructor(public category: ThermoErrorCategory, message: string, public detail: ThermoErrorDetail = {}) {
    super(message);
    this.name = `ThermoError/${category}`;
  }
}

/** A start/end keyword, the log file itself or a required column could not be found. */
export class NotFoundError extends ThermoError {
  constructor(message: string, detail: ThermoErrorDetail = {}) {
    super(ThermoErrorCategory.NotFound, message, detail);
  }
}

/** A header or data line does not have the expected shape. Aborts the whole load. */
export class ParseError extends ThermoError {
  constructor(message: string, detail: ThermoErrorDetail = {}) {
    super(ThermoErrorCategory.Parse, message, detail);
  }
}

export class UnknownColumnError extends ThermoError {
  constructor(column: string, available: readonly string[]) {
    super(
      ThermoErrorCategory.UnknownColumn,
      `Unknown thermo property "${column}". Available: ${available.join(', ')}`,
      { column },
    );
  }
}

/** Bounds were requested on a reference column the table does not have. */
export class BoundsRangeError extends ThermoError {
  constructor(column: string) {
    super(ThermoErrorCategory.Range, `Reference column "${column}" not found; cannot apply bounds`, { column });
  }
}

export class ConfigError extends ThermoError {
  constructor(message: string, detail: ThermoErrorDetail = {}) {
    super(ThermoErrorCategory.Config, message, detail);
  }
}
