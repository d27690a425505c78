#!/usr/bin/env node
// src/Index.ts
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { CliOptions } from './model/CliOptions';
import { ConfLayer } from './model/ConfLayer';
import { ExecConf } from './model/ExecConf';
import { ExecConfReader } from './reader/ExecConfReader';
import { ExecProcessor } from './processor/ExecProcessor';
import { StatsProcessor } from './processor/StatsProcessor';
import { CsvProcessor } from './processor/CsvProcessor';

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('thermo-log')
    .description('Extract thermo data from a LAMMPS log file')
    .option('-l, --logFile <path>', 'Path to the LAMMPS log file')
    .option('-c, --confFile <path>', 'Path to a YAML run configuration file')
    .option('-s, --startKeyword <word>', 'First word of the thermo header line (default "Step")')
    .option('-e, --endKeyword <word>', 'First word of the line after the thermo data (default "Loop")')
    .option('--readToEnd', 'Read to the end of the file, dropping the last line')
    .option('-k, --skipSections <n>', 'Number of thermo blocks to skip')
    .option('-p, --props <names...>', 'Properties to select (default: all)')
    .option('--step <range>', 'Inclusive Step window, e.g. 1000:5000, 1000: or :5000')
    .option('--time <range>', 'Inclusive Time window, same syntax as --step')
    .option('--list', 'Print the available properties')
    .option('--stats', 'Print count, mean, stdev, min and max of the selection')
    .option('-o, --outputFolder <path>', 'Folder where output files will be created')
    .option('--csv <fileName>', 'Write the selection to a CSV file')
    .option('--excel <fileName>', 'Write the selection to an Excel workbook')
    .option('--sheetName <name>', 'Worksheet name for --excel');
  return program;
}

/**
 * Builds the run configuration from CLI flags, the optional YAML file and the environment, in that order of precedence.
 */
export function readExecConf(options: CliOptions, env: NodeJS.ProcessEnv): ExecConf {
  const layers: ConfLayer[] = [ExecConfReader.fromCliOptions(options)];
  if (options.confFile) {
    layers.push(ExecConfReader.readConfFile(options.confFile));
  }
  layers.push(ExecConfReader.readEnv(env));
  return ExecConfReader.buildExecConf(...layers);
}

/**
 * Runs one command: loads, selects and writes outputs, then prints what was asked for.
 */
export function run(options: CliOptions, env: NodeJS.ProcessEnv): void {
  const execConf = readExecConf(options, env);
  const result = ExecProcessor.process(execConf);

  if (execConf.listProps) {
    console.log(result.table.availableProps().join('\n'));
  }
  if (result.stats) {
    console.log(StatsProcessor.formatTable(result.stats));
  }
  if (execConf.printsSelection()) {
    console.log(CsvProcessor.generateCSV(result.props, result.selection));
  }
}

function main(): void {
  // Load environment variables from .env file
  dotenv.config();

  const program = buildProgram().parse(process.argv);

  try {
    run(program.opts<CliOptions>(), process.env);
  } catch (error) {
    console.error('Failed to process log file:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
