#!/usr/bin/env node
// Task CLI Entry Point
// Usage:
//   npm run task -- --experiment Calibration
//   npm run task -- -e "Copy Phrase" --params parameters/parameters.json
//   npm run task -- --list

import ora from 'ora';
import chalk from 'chalk';
import { config, validateConfig } from '../shared/config.js';
import { CliUsageError } from '../shared/errors.js';
import { createLogger } from '../shared/utils/logger.js';
import { formatDuration } from '../shared/utils/timer.js';
import type { TaskSummary } from '../shared/types/index.js';
import { SimulatedAcquisitionClient } from '../acquisition/simulated-client.js';
import { ConsoleDisplay } from '../display/console-display.js';
import { createDefaultTaskRegistry, type DefaultRegistryOptions } from '../tasks/index.js';
import { USAGE, parseArgs } from './cli-args.js';
import { defaultSavePath, loadParameters } from './session-files.js';
import { TaskDispatcher } from './task-dispatcher.js';
import { parseTaskType, taskTypeLabel } from './task-type.js';

const log = createLogger('TaskCLI');

const followTask: DefaultRegistryOptions['observe'] = task => {
  task.on('inquiry:start', inquiry => {
    console.log(chalk.gray(`Inquiry ${inquiry.index + 1} (target ${inquiry.target})`));
  });
  task.on('selection', (symbol, typedText) => {
    console.log(chalk.green(`Selected ${symbol} -> ${typedText}`));
  });
};

function printSummary(summary: TaskSummary): void {
  console.log(chalk.cyan(`\n${summary.label} session ${summary.sessionId}`));
  console.log(`  Duration:  ${formatDuration(summary.durationMs)}`);
  console.log(`  Inquiries: ${summary.inquiries.length}`);
  console.log(`  Samples:   ${summary.samplesAcquired}`);
  console.log(`  Offset:    ${summary.calibrationOffset.toFixed(4)}s`);
  if (summary.kind === 'copy-phrase') {
    const status = summary.completed ? chalk.green('complete') : chalk.yellow('incomplete');
    console.log(`  Typed:     ${summary.typedText} (${status}, target ${summary.taskText})`);
  }
  console.log(`  Saved to:  ${summary.fileSavePath}\n`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2), config.defaults);

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const registry = createDefaultTaskRegistry({ observe: followTask });

  if (options.list) {
    for (const taskType of registry.taskTypes()) {
      console.log(`  ${taskType.mode.padEnd(6)} ${taskType.experimentType}`);
    }
    return;
  }

  const spinner = ora('Validating configuration...').start();
  const validation = validateConfig();
  if (!validation.valid) {
    spinner.fail('Configuration errors');
    console.error(chalk.red(validation.errors.join('\n')));
    process.exit(1);
  }
  spinner.succeed('Configuration valid');

  const taskType = parseTaskType({ mode: options.mode, experimentType: options.experimentType });
  const label = taskTypeLabel(taskType);

  spinner.start('Loading parameters...');
  const paramsPath = options.paramsPath ?? config.parametersPath;
  const parameters = await loadParameters(paramsPath, options.paramsPath === undefined);
  spinner.succeed(`Loaded ${Object.keys(parameters).length} parameters from ${paramsPath}`);

  const fileSavePath = options.savePath ?? defaultSavePath(config.dataSaveRoot, taskType);
  const daq = new SimulatedAcquisitionClient({
    deviceName: config.acquisition.deviceName,
    sampleRate: config.acquisition.sampleRate,
  });
  const display = new ConsoleDisplay();
  const dispatcher = new TaskDispatcher(registry);

  console.log(chalk.cyan(`\nStarting ${label}\n`));
  const summary = await dispatcher.dispatch(daq, display, taskType, parameters, fileSavePath);
  printSummary(summary);
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(chalk.red(error.message));
    console.log(USAGE);
  } else {
    log.error('Task run failed', { error: error instanceof Error ? error.message : String(error) });
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exit(1);
});
