import { ConfigError } from '../errors/ThermoError';

export const DEFAULT_START_KEYWORD = 'Step';
export const DEFAULT_END_KEYWORD = 'Loop';

export class ScanConf {
  startKeyword: string;
  skipSections: number;
  /** `null` reads to the end of the file and drops the last line. */
  endKeyword: string | null;

  constructor(
    startKeyword: string = DEFAULT_START_KEYWORD,
    skipSections: number = 0,
    endKeyword: string | null = DEFAULT_END_KEYWORD
  ) {
    if (startKeyword.trim() === '' || /\s/.test(startKeyword)) {
      throw new ConfigError(`Start keyword must be a single non-empty token, got "${startKeyword}"`, { keyword: startKeyword });
    }
    if (endKeyword !== null && (endKeyword.trim() === '' || /\s/.test(endKeyword))) {
      throw new ConfigError(`End keyword must be a single non-empty token, got "${endKeyword}"`, { keyword: endKeyword });
    }
    if (!Number.isInteger(skipSections) || skipSections < 0) {
      throw new ConfigError(`skipSections must be a non-negative integer, got ${skipSections}`, { value: String(skipSections) });
    }
    this.startKeyword = startKeyword;
    this.skipSections = skipSections;
    this.endKeyword = endKeyword;
  }
}
