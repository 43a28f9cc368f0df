#!/usr/bin/env -S node --import tsx

/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow CLI - Plan, run and fuse image analysis workflows
 *
 * Experiments are referenced by the id issued by `cellflow experiment create`.
 */

import { createRequire } from 'node:module';
import { Argument, Command } from 'commander';
import { STEP_NAMES } from '@cellflow/types';
import { experimentCommand } from './commands/experiment.js';
import { validateCommand } from './commands/validate.js';
import { jobsCommand } from './commands/jobs.js';
import { submitCommand } from './commands/submit.js';
import { logCommand } from './commands/log.js';
import { historyCommand } from './commands/history.js';
import { fuseCommand, mergeCommand } from './commands/fuse.js';
import { STEP_ACTIONS, increaseVerbosity, stepCommand, type StepCommandOptions } from './commands/step.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command();

program
  .name('cellflow')
  .description('Plan and run multi-stage image analysis workflows')
  .version(packageJson.version);

// Experiment commands
program
  .command('experiment')
  .description('Experiment operations')
  .addCommand(
    new Command('create')
      .description('Register an experiment')
      .argument('<name>', 'Experiment name')
      .argument('<root>', 'Experiment root directory')
      .action(experimentCommand.create)
  )
  .addCommand(
    new Command('list')
      .description('List experiments')
      .action(experimentCommand.list)
  );

// Workflow commands
program
  .command('validate <file>')
  .description('Validate a workflow description (YAML)')
  .action(validateCommand);

// Step commands
program
  .command('jobs <experiment> <step>')
  .description('Show the job descriptions of a planned step')
  .action(jobsCommand);

program
  .command('submit <experiment> <step>')
  .description('Submit the jobs of a planned step and monitor them')
  .option('--cap <n>', 'Max jobs submitted and running at once (default: submitCap)')
  .option('--interval <seconds>', 'Seconds between status polls (default: monitoringInterval)')
  .option('--walltime <HH:MM:SS>', 'Wall-time of each run job')
  .option('--memory <mb>', 'Memory of each run job in megabytes')
  .option('--cores <n>', 'CPU cores of each run job')
  .action(submitCommand);

program
  .command('log <experiment> <step>')
  .description('View the latest log of a job (the collect job without --job)')
  .option('--job <id>', 'Run job id')
  .action(logCommand);

program
  .command('history <experiment>')
  .description('List the submissions of an experiment with their job records')
  .action(historyCommand);

// One command per workflow step; submitted jobs call back into these
for (const step of STEP_NAMES) {
  program
    .command(step)
    .description(`Plan the ${step} step or process one of its jobs`)
    .argument('<experiment>', 'Experiment id')
    .addArgument(new Argument('<action>', 'Step action').choices(STEP_ACTIONS))
    .option('-v, --verbose', 'Increase verbosity (repeatable)', increaseVerbosity, 0)
    .option('--job <id>', 'Run job id (run)')
    .option('--args <json>', 'Step arguments as a JSON object (init)')
    .option('--workflow <file>', 'Take the step arguments from a workflow description (init)')
    .action((experiment: string, action: string, options: StepCommandOptions) =>
      stepCommand(step, experiment, action, options)
    );
}

// Fusion commands
program
  .command('fuse <output> <fragments...>')
  .description('Fuse dataset fragments into one output file')
  .option('--delete', 'Delete each fragment once it is fused')
  .action(fuseCommand);

program
  .command('merge <old> <new>')
  .description('Copy datasets of an older output that a new output lacks')
  .action(mergeCommand);

program.parse();
