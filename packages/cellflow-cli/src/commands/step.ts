/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow <step> command - Plan a step or process one of its jobs
 *
 * Usage:
 *   cellflow jterator 1 init --workflow workflow.yaml   # Write the job descriptions
 *   cellflow jterator -v 1 run --job 3                  # Process run job 3
 *   cellflow jterator 1 collect                         # Collect the run job outputs
 *
 * Planners are registered by the modules listed under `planners` in the
 * configuration. `run` and `collect` are what submitted jobs execute.
 */

import { runJobName } from '@cellflow/core';
import {
  exitError,
  formatError,
  openExperimentStore,
  openStepPlannerRegistry,
  parsePositiveInt,
} from '../utils.js';
import { openStepPlanner, readStepArgs, summarizeDescriptions, type StepArgsSource } from './steps.impl.js';

export const STEP_ACTIONS = ['init', 'run', 'collect'] as const;

export interface StepCommandOptions extends StepArgsSource {
  /** Number of -v flags */
  verbose: number;
  job?: string;
}

/** Commander parser counting repeated -v flags */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export async function stepCommand(
  step: string,
  experimentArg: string,
  action: string,
  options: StepCommandOptions
): Promise<void> {
  try {
    const experimentId = parsePositiveInt(experimentArg, 'experiment');
    const { config, store } = openExperimentStore();
    const registry = await openStepPlannerRegistry(config);
    const verbosity = options.verbose > 0 ? options.verbose : config.verbosity;
    const planner = await openStepPlanner(store, registry, config, experimentId, step, verbosity);

    switch (action) {
      case 'init': {
        const descriptions = await planner.init(await readStepArgs(step, options));
        console.log(summarizeDescriptions(step, descriptions));
        console.log(`Job descriptions: ${planner.jobDescriptionsLocation}`);
        break;
      }
      case 'run': {
        if (options.job === undefined) {
          exitError('run requires --job <id>');
        }
        const jobId = parsePositiveInt(options.job, '--job');
        await planner.run(jobId);
        console.log(`Completed ${runJobName(step, jobId)}`);
        break;
      }
      case 'collect': {
        const removed = await planner.collect();
        console.log(`Collected the outputs of ${step}`);
        if (removed.length > 0) {
          console.log(`Removed ${removed.length} input file${removed.length === 1 ? '' : 's'}`);
        }
        break;
      }
      default:
        exitError(`Unknown action '${action}'. Use one of: ${STEP_ACTIONS.join(', ')}`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
