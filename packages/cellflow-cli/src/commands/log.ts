/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow log command - View job log output
 *
 * Usage:
 *   cellflow log 1 jterator --job 3   # Latest log of run job 3
 *   cellflow log 1 jterator           # Latest log of the collect job
 */

import { exitError, formatError, openExperimentStore, parsePositiveInt } from '../utils.js';
import { readStepLog } from './steps.impl.js';

export async function logCommand(experimentArg: string, step: string, options: { job?: string }): Promise<void> {
  try {
    const experimentId = parsePositiveInt(experimentArg, 'experiment');
    const jobId = options.job ? parsePositiveInt(options.job, '--job') : null;
    const { store } = openExperimentStore();
    const { stdout, stderr, file } = await readStepLog(store, experimentId, step, jobId);

    console.log(`Log: ${file}`);
    console.log('');

    if (stdout.length === 0 && stderr.length === 0) {
      console.log('No log output.');
      return;
    }

    if (stdout.length > 0) {
      console.log('=== STDOUT ===');
      console.log(stdout);
    }

    if (stderr.length > 0) {
      if (stdout.length > 0) {
        console.log('');
      }
      console.log('=== STDERR ===');
      console.log(stderr);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
