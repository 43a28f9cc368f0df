/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow history command - List the submissions of an experiment
 */

import { failedJobs, formatStatusTable } from '@cellflow/core';
import { exitError, formatError, openExperimentStore, parsePositiveInt } from '../utils.js';

export async function historyCommand(experimentArg: string): Promise<void> {
  try {
    const experimentId = parsePositiveInt(experimentArg, 'experiment');
    const { store } = openExperimentStore();
    const submissions = await store.listSubmissions(experimentId);

    if (submissions.length === 0) {
      console.log(`No submissions for experiment ${experimentId}`);
      return;
    }

    for (const submission of submissions) {
      const rows = await store.listJobRecords(submission.id);
      const failed = failedJobs(rows).length;
      console.log(
        `Submission ${submission.id}  ${submission.step}  ${submission.createdAt}  ` +
          `${rows.length} job(s), ${failed} failed`
      );
      if (rows.length > 0) {
        for (const line of formatStatusTable(rows).split('\n')) {
          console.log(`  ${line}`);
        }
      }
      console.log('');
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
