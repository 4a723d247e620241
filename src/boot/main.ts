/**
 * Command line entry point
 *
 * encode   - comma-separated rows to a sensor frame file
 * classify - frame file to essential and signal frames
 * run      - both, in that order (default)
 */

import chalk from 'chalk';
import { Command, program } from 'commander';

import { createNodeFileApi } from '@logging';

import { applyCliOverrides, classifyCommand, encodeCommand, reportCommand } from './commands';
import CONFIG from './config';
import { applyEnvOverrides, loadDotenv } from './env';
import { initialize } from './init';
import type { CliOptions, Runtime } from './types';

function parseNumberOption(value: string): number {
  return Number(value);
}

function printLine(line: string): void {
  console.log(line);
}

/**
 * Wrap a command handler with configuration, start-up and error handling
 */
function action(handler: (runtime: Runtime, options: CliOptions) => void) {
  return function(_options: CliOptions, command: Command): void {
    const options = command.optsWithGlobals<CliOptions>();

    try {
      const config = applyCliOverrides(applyEnvOverrides(CONFIG, process.env), options);
      const runtime = initialize(config, { consoleApi: console, fileApi: createNodeFileApi() });
      if (!runtime) {
        process.exit(1);
      }
      handler(runtime, options);
    } catch (error) {
      console.error(chalk.red('✗ Error: ') + (error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  };
}

loadDotenv();

program
  .name('power-aware-iot')
  .description('Encode sensor rows into checksummed frames and pass on only the essential ones')
  .option('-l, --log-level <level>', 'Log level (debug, info, warning, critical or 0-3)')
  .option('--log-file <path>', 'Also write the log to this file')
  .option('--no-color', 'Disable coloured console output');

program
  .command('encode')
  .description('Encode comma-separated sensor rows into a frame file')
  .option('-i, --input <path>', 'Sensor rows (timestamp, temperature, humidity)')
  .option('-f, --frames <path>', 'Frame file to write')
  .action(action(function(runtime) {
    const count = encodeCommand(runtime);
    printLine('Encoded ' + count + ' frames into ' + runtime.config.FRAME_FILE_PATH);
  }));

program
  .command('classify')
  .description('Classify a frame file and count essential and signal frames')
  .option('-f, --frames <path>', 'Frame file to read')
  .option('-w, --window <size>', 'Training window in frames', parseNumberOption)
  .option('-t, --tolerance <value>', 'Half-width of the mid band', parseNumberOption)
  .option('--list', 'Print every essential and signal frame')
  .option('--plot <path>', 'Write the chart series as JSON')
  .action(action(function(runtime, options) {
    reportCommand(classifyCommand(runtime), options, printLine);
  }));

program
  .command('run', { isDefault: true })
  .description('Encode the sensor rows, then classify the frames')
  .option('-i, --input <path>', 'Sensor rows (timestamp, temperature, humidity)')
  .option('-f, --frames <path>', 'Frame file to write and read')
  .option('-w, --window <size>', 'Training window in frames', parseNumberOption)
  .option('-t, --tolerance <value>', 'Half-width of the mid band', parseNumberOption)
  .option('--list', 'Print every essential and signal frame')
  .option('--plot <path>', 'Write the chart series as JSON')
  .action(action(function(runtime, options) {
    encodeCommand(runtime);
    reportCommand(classifyCommand(runtime), options, printLine);
  }));

program.parse(process.argv);
