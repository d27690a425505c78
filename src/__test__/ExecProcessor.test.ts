import * as fs from 'fs';
import * as path from 'path';
import { ExecProcessor } from '../processor/ExecProcessor';
import { ExecConf } from '../model/ExecConf';
import { OutputConf } from '../model/OutputConf';
import { ScanConf } from '../model/ScanConf';
import { UnknownColumnError } from '../errors/ThermoError';
import { cleanDir, fixturePath, prepareTempDir, writeLog } from './helpers/testFs';

let DIR: string;
beforeEach(() => {
  DIR = prepareTempDir('exec');
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});
afterEach(() => {
  cleanDir(DIR);
  jest.restoreAllMocks();
});

describe('ExecProcessor.process', () => {
  it('selects, summarizes and exports the configured block', () => {
    const execConf = new ExecConf(
      fixturePath('two_runs.log'),
      new ScanConf('Step', 2),
      ['Step', 'Temp'],
      { reference: 'step', start: 300, end: 400 },
      false,
      true,
      new OutputConf(DIR, 'selection.csv', 'selection.xlsx')
    );

    const result = ExecProcessor.process(execConf);

    expect(result.props).toEqual(['Step', 'Temp']);
    expect(result.selection).toEqual([
      [300, 301.25],
      [400, 300.5],
    ]);
    expect(result.stats?.map(s => s.mean)).toEqual([350, 300.875]);
    expect(result.outputFiles).toEqual([path.join(DIR, 'selection.csv'), path.join(DIR, 'selection.xlsx')]);
    expect(fs.readFileSync(path.join(DIR, 'selection.csv'), 'utf8')).toBe('Step,Temp\n300,301.25\n400,300.5');
    expect(fs.existsSync(path.join(DIR, 'selection.xlsx'))).toBe(true);
  });

  it('selects every property when none are requested', () => {
    const logFile = writeLog(DIR, 'short.log', ['Step Temp', '0 300', '10 310', 'Loop time of 0.1']);
    const result = ExecProcessor.process(new ExecConf(logFile, new ScanConf()));

    expect(result.props).toEqual(['Step', 'Temp']);
    expect(result.selection).toEqual([
      [0, 300],
      [10, 310],
    ]);
    expect(result.stats).toBeUndefined();
    expect(result.outputFiles).toEqual([]);
  });

  it('writes nothing when a requested property is missing', () => {
    const logFile = writeLog(DIR, 'short.log', ['Step Temp', '0 300', 'Loop']);
    const execConf = new ExecConf(logFile, new ScanConf(), ['Press'], undefined, false, false, new OutputConf(DIR, 'out.csv'));

    expect(() => ExecProcessor.process(execConf)).toThrow(UnknownColumnError);
    expect(fs.existsSync(path.join(DIR, 'out.csv'))).toBe(false);
  });
});
