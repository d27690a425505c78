import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ExecConf } from '../model/ExecConf';
import { ScanConf, DEFAULT_END_KEYWORD, DEFAULT_START_KEYWORD } from '../model/ScanConf';
import { OutputConf, DEFAULT_SHEET_NAME } from '../model/OutputConf';
import { BoundsReference, PropBounds } from '../model/PropBounds';
import { ConfLayer } from '../model/ConfLayer';
import { CliOptions } from '../model/CliOptions';
import { ConfigError } from '../errors/ThermoError';

type YamlRecord = { [key: string]: unknown };

export class ExecConfReader {
  /**
   * Reads a YAML run configuration file.
   * @param confFilePath Path to the YAML file.
   */
  static readConfFile(confFilePath: string): ConfLayer {
    try {
      const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
      const confData = yaml.load(confFileContent) ?? {};
      if (!this.isRecord(confData)) {
        throw new Error('top level must be a mapping');
      }
      return this.parseConfData(confData);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Error reading or parsing configuration file: ${message}`, { filePath: confFilePath });
    }
  }

  static parseConfData(confData: YamlRecord): ConfLayer {
    const scan = this.optionalRecord(confData, 'scan');
    const output = this.optionalRecord(confData, 'output');
    const bounds = this.optionalRecord(confData, 'bounds');

    return {
      logFile: this.optionalString(confData, 'logFile'),
      startKeyword: scan && this.optionalString(scan, 'startKeyword'),
      endKeyword: scan && this.optionalNullableString(scan, 'endKeyword'),
      skipSections: scan && this.optionalNumber(scan, 'skipSections'),
      props: this.parseProps(confData.props),
      bounds: bounds && this.parseBounds(bounds),
      listProps: this.optionalBoolean(confData, 'listProps'),
      stats: this.optionalBoolean(confData, 'stats'),
      outputFolder: output && this.optionalString(output, 'folder'),
      csvFile: output && this.optionalString(output, 'csvFile'),
      excelFile: output && this.optionalString(output, 'excelFile'),
      sheetName: output && this.optionalString(output, 'sheetName'),
    };
  }

  /**
   * Reads `THERMO_*` defaults, typically loaded from `.env` by dotenv.
   */
  static readEnv(env: NodeJS.ProcessEnv): ConfLayer {
    const endKeyword = this.nonEmpty(env.THERMO_END_KEYWORD);
    const skipSections = this.nonEmpty(env.THERMO_SKIP_SECTIONS);
    return {
      startKeyword: this.nonEmpty(env.THERMO_START_KEYWORD),
      endKeyword: endKeyword === undefined || endKeyword.toLowerCase() !== 'none' ? endKeyword : null,
      skipSections: skipSections === undefined ? undefined : this.parseInteger(skipSections, 'THERMO_SKIP_SECTIONS'),
      outputFolder: this.nonEmpty(env.THERMO_OUTPUT_FOLDER),
    };
  }

  static fromCliOptions(options: CliOptions): ConfLayer {
    if (options.step !== undefined && options.time !== undefined) {
      throw new ConfigError('Use either --step or --time bounds, not both');
    }
    let bounds: PropBounds | undefined;
    if (options.step !== undefined) {
      bounds = this.parseRange(options.step, 'step');
    } else if (options.time !== undefined) {
      bounds = this.parseRange(options.time, 'time');
    }

    return {
      logFile: options.logFile,
      startKeyword: options.startKeyword,
      endKeyword: options.readToEnd ? null : options.endKeyword,
      skipSections: options.skipSections === undefined ? undefined : this.parseInteger(options.skipSections, '--skipSections'),
      props: options.props,
      bounds,
      listProps: options.list,
      stats: options.stats,
      outputFolder: options.outputFolder,
      csvFile: options.csv,
      excelFile: options.excel,
      sheetName: options.sheetName,
    };
  }

  /**
   * Merges layers, first one wins, and applies built-in defaults.
   */
  static buildExecConf(...layers: ConfLayer[]): ExecConf {
    const pick = <K extends keyof ConfLayer>(key: K): ConfLayer[K] | undefined => {
      for (const layer of layers) {
        if (layer[key] !== undefined) {
          return layer[key];
        }
      }
      return undefined;
    };

    const logFile = pick('logFile');
    if (logFile === undefined || logFile.trim() === '') {
      throw new ConfigError('No log file given (use --logFile or logFile in the configuration file)');
    }

    const endKeyword = pick('endKeyword');
    const scanConf = new ScanConf(
      pick('startKeyword') ?? DEFAULT_START_KEYWORD,
      pick('skipSections') ?? 0,
      endKeyword === undefined ? DEFAULT_END_KEYWORD : endKeyword
    );
    const outputConf = new OutputConf(
      pick('outputFolder') ?? './',
      pick('csvFile'),
      pick('excelFile'),
      pick('sheetName') ?? DEFAULT_SHEET_NAME
    );

    return new ExecConf(
      logFile,
      scanConf,
      pick('props') ?? [],
      pick('bounds'),
      pick('listProps') ?? false,
      pick('stats') ?? false,
      outputConf
    );
  }

  /**
   * Parses `start:end`, `start:` or `:end` into inclusive bounds.
   */
  static parseRange(text: string, reference: BoundsReference): PropBounds {
    const parts = text.split(':');
    if (parts.length !== 2) {
      throw new ConfigError(`Invalid ${reference} range "${text}", expected start:end`, { value: text });
    }
    const [start, end] = parts.map(part => (part.trim() === '' ? undefined : this.parseBound(part, reference)));
    return { reference, start, end };
  }

  private static parseBound(text: string, reference: BoundsReference): number {
    const value = Number(text.trim());
    if (!Number.isFinite(value)) {
      throw new ConfigError(`Invalid ${reference} bound "${text}"`, { value: text });
    }
    return value;
  }

  private static parseInteger(text: string, source: string): number {
    if (!/^\d+$/.test(text.trim())) {
      throw new ConfigError(`${source} must be a non-negative integer, got "${text}"`, { value: text });
    }
    return Number(text.trim());
  }

  private static parseBounds(boundsData: YamlRecord): PropBounds {
    const reference = boundsData.reference ?? 'step';
    if (!this.isReference(reference)) {
      throw new ConfigError(`bounds.reference must be "step" or "time", got "${String(reference)}"`);
    }
    return {
      reference,
      start: this.optionalNumber(boundsData, 'start'),
      end: this.optionalNumber(boundsData, 'end'),
    };
  }

  private static parseProps(propsData: unknown): string[] | undefined {
    if (propsData === undefined || propsData === null) {
      return undefined;
    }
    if (typeof propsData === 'string') {
      return [propsData];
    }
    if (Array.isArray(propsData) && propsData.every((prop): prop is string => typeof prop === 'string')) {
      return propsData;
    }
    throw new ConfigError('props must be a property name or a list of property names');
  }

  private static isReference(value: unknown): value is BoundsReference {
    return value === 'step' || value === 'time';
  }

  private static isRecord(value: unknown): value is YamlRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private static optionalRecord(data: YamlRecord, key: string): YamlRecord | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!this.isRecord(value)) {
      throw new ConfigError(`${key} must be a mapping`);
    }
    return value;
  }

  private static optionalString(data: YamlRecord, key: string): string | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ConfigError(`${key} must be a string`, { value: String(value) });
    }
    return value;
  }

  private static optionalNullableString(data: YamlRecord, key: string): string | null | undefined {
    if (key in data && data[key] === null) {
      return null;
    }
    return this.optionalString(data, key);
  }

  private static optionalNumber(data: YamlRecord, key: string): number | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigError(`${key} must be a number`, { value: String(value) });
    }
    return value;
  }

  private static optionalBoolean(data: YamlRecord, key: string): boolean | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigError(`${key} must be true or false`, { value: String(value) });
    }
    return value;
  }

  private static nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }
}
