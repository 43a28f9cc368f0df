/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow jobs command - Show the job descriptions of a planned step
 */

import { exitError, formatError, openExperimentStore, parsePositiveInt } from '../utils.js';
import { describeStep } from './steps.impl.js';

export async function jobsCommand(experimentArg: string, step: string): Promise<void> {
  try {
    const experimentId = parsePositiveInt(experimentArg, 'experiment');
    const { store } = openExperimentStore();
    process.stdout.write(await describeStep(store, experimentId, step));
  } catch (err) {
    exitError(formatError(err));
  }
}
