import { LogBlockScanner } from '../processor/LogBlockScanner';
import { ScanConf } from '../model/ScanConf';
import { NotFoundError, ParseError, ThermoErrorCategory } from '../errors/ThermoError';

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});
afterEach(() => jest.restoreAllMocks());

const EXAMPLE = [
  'Step Temp Volume',
  '0 300.0 1000.0',
  '100 305.2 1001.5',
  'Loop time of 1.0 on 1 procs',
];

describe('LogBlockScanner.scan', () => {
  it('reads the header and rows up to the end keyword', () => {
    const block = LogBlockScanner.scan(EXAMPLE, new ScanConf());
    expect(block.headerNames).toEqual(['Step', 'Temp', 'Volume']);
    expect(block.data).toEqual([
      [0, 300, 1000],
      [100, 305.2, 1001.5],
    ]);
  });

  it('matches the start keyword on the first token only', () => {
    const lines = ['thermo_style custom Step Temp', '  Step   Temp  ', '1 2', 'Loop'];
    const block = LogBlockScanner.scan(lines, new ScanConf());
    expect(block.headerNames).toEqual(['Step', 'Temp']);
    expect(block.data).toEqual([[1, 2]]);
  });

  it('skips earlier blocks when skipSections is set', () => {
    const lines = ['Step A', '1 10', 'Loop', 'Step A B', '2 20 200', '3 30 300', 'Loop'];
    const block = LogBlockScanner.scan(lines, new ScanConf('Step', 1));
    expect(block.headerNames).toEqual(['Step', 'A', 'B']);
    expect(block.data).toEqual([
      [2, 20, 200],
      [3, 30, 300],
    ]);
  });

  it('fails with NotFoundError when the requested occurrence does not exist', () => {
    const lines = ['Step A', '1 10', 'Loop'];
    let caught: unknown;
    try {
      LogBlockScanner.scan(lines, new ScanConf('Step', 1));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NotFoundError);
    expect(caught).toMatchObject({
      category: ThermoErrorCategory.NotFound,
      detail: { keyword: 'Step' },
      message: 'Start keyword "Step" occurrence 2 not found in log (found 1)',
    });
  });

  it('fails with NotFoundError when the end keyword never follows the header', () => {
    const lines = ['Step A', '1 10', '2 20'];
    expect(() => LogBlockScanner.scan(lines, new ScanConf())).toThrow(NotFoundError);
    expect(() => LogBlockScanner.scan(lines, new ScanConf())).toThrow('End keyword "Loop" not found after header on line 1');
  });

  it('drops the last line when reading to the end of the file', () => {
    const lines = ['Step A', '1 10', '2 20', '3 3'];
    const block = LogBlockScanner.scan(lines, new ScanConf('Step', 0, null));
    expect(block.data).toEqual([
      [1, 10],
      [2, 20],
    ]);
  });

  it('returns no rows when the header is the last line and reading to the end', () => {
    const block = LogBlockScanner.scan(['log start', 'Step A'], new ScanConf('Step', 0, null));
    expect(block.headerNames).toEqual(['Step', 'A']);
    expect(block.data).toEqual([]);
  });

  it('accepts an empty block', () => {
    const block = LogBlockScanner.scan(['Step A', 'Loop'], new ScanConf());
    expect(block.data).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('Thermo block starting at line 1 has no data rows.');
  });

  it('aborts on a row with the wrong number of fields', () => {
    const lines = ['Step A B', '1 2 3', '4 5', 'Loop'];
    let caught: unknown;
    try {
      LogBlockScanner.scan(lines, new ScanConf());
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ detail: { line: '4 5', lineNumber: 3 } });
  });

  it('aborts on a non-numeric field', () => {
    const lines = ['Step A', '1 abc', 'Loop'];
    expect(() => LogBlockScanner.scan(lines, new ScanConf())).toThrow('Line 2 has non-numeric field "abc": "1 abc"');
  });

  it('treats a blank line inside the block as a parse error', () => {
    const lines = ['Step A', '1 2', '', '3 4', 'Loop'];
    expect(() => LogBlockScanner.scan(lines, new ScanConf())).toThrow(ParseError);
  });

  it('uses custom keywords', () => {
    const lines = ['Time Temp', '0.5 300', 'Done'];
    const block = LogBlockScanner.scan(lines, new ScanConf('Time', 0, 'Done'));
    expect(block.data).toEqual([[0.5, 300]]);
  });
});

describe('LogBlockScanner.parseNumber', () => {
  it('converts the numeric forms found in logs', () => {
    expect(LogBlockScanner.parseNumber('42')).toBe(42);
    expect(LogBlockScanner.parseNumber('-.5')).toBe(-0.5);
    expect(LogBlockScanner.parseNumber('+3.')).toBe(3);
    expect(LogBlockScanner.parseNumber('1.5e-3')).toBe(0.0015);
    expect(LogBlockScanner.parseNumber('2E+2')).toBe(200);
    expect(LogBlockScanner.parseNumber('nan')).toBeNaN();
    expect(LogBlockScanner.parseNumber('-inf')).toBe(-Infinity);
    expect(LogBlockScanner.parseNumber('Infinity')).toBe(Infinity);
  });

  it('rejects everything else', () => {
    expect(LogBlockScanner.parseNumber('1,0')).toBeNull();
    expect(LogBlockScanner.parseNumber('0x10')).toBeNull();
    expect(LogBlockScanner.parseNumber('e5')).toBeNull();
    expect(LogBlockScanner.parseNumber('-')).toBeNull();
  });
});
