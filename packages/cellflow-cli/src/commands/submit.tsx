/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow submit command - Run the jobs of a planned step
 *
 * Usage:
 *   cellflow submit 1 jterator
 *   cellflow submit 1 jterator --cap 100 --interval 10
 *   cellflow submit 1 jterator --walltime 01:00:00 --memory 2000
 */

import { render } from 'ink';
import {
  JobScheduler,
  LocalExecutionEngine,
  MonitorAbortedError,
  formatStatusTable,
  type ProgressReport,
} from '@cellflow/core';
import type { JobStatusRow } from '@cellflow/types';
import { Error as ErrorMessage, MonitorView, Success } from '../ui/index.js';
import { exitError, formatError, openExperimentStore, parsePositiveInt } from '../utils.js';
import { prepareSubmission } from './steps.impl.js';

interface SubmitOptions {
  cap?: string;
  interval?: string;
  walltime?: string;
  memory?: string;
  cores?: string;
}

function describeFailure(row: JobStatusRow): string {
  return row.state === 'stopped' ? `${row.name}: stopped` : `${row.name}: exit code ${row.exitCode}`;
}

/**
 * Submit the jobs of a step and monitor them until they terminate.
 */
export async function submitCommand(experimentArg: string, step: string, options: SubmitOptions): Promise<void> {
  try {
    const experimentId = parsePositiveInt(experimentArg, 'experiment');
    const { config, store } = openExperimentStore();
    const cap = options.cap ? parsePositiveInt(options.cap, '--cap') : config.submitCap;
    const interval = options.interval ? parsePositiveInt(options.interval, '--interval') : config.monitoringInterval;

    const { record, submission } = await prepareSubmission(store, config, experimentId, step, {
      walltime: options.walltime,
      memory: options.memory ? parsePositiveInt(options.memory, '--memory') : undefined,
      cores: options.cores ? parsePositiveInt(options.cores, '--cores') : undefined,
    });

    console.log(`Submission ${record.id}: ${submission.jobs.length} job(s) of step ${step}`);

    const engine = new LocalExecutionEngine();
    const view = (report: ProgressReport | null) => (
      <MonitorView submissionId={record.id} step={submission.step} report={report} />
    );
    const monitor = render(view(null));

    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);

    const scheduler = new JobScheduler({
      engine,
      store,
      interval,
      onProgress: (report) => monitor.rerender(view(report)),
    });

    try {
      const result = await scheduler.submit(submission, { cap, signal: controller.signal });
      monitor.unmount();
      await engine.drain();

      if (result.failed.length > 0) {
        render(
          <ErrorMessage
            message={`Submission ${record.id} ${result.state}: ${result.failed.length} job(s) failed`}
            details={result.failed.map(describeFailure)}
          />
        ).unmount();
        console.log(`Use "cellflow log ${experimentId} ${submission.step} --job <id>" to view job logs.`);
        process.exit(1);
      }
      render(<Success message={`Submission ${record.id} ${result.state}`} />).unmount();
    } catch (err) {
      monitor.unmount();
      if (err instanceof MonitorAbortedError) {
        console.log(formatStatusTable(err.lastStatus));
        exitError(`Monitoring of submission ${record.id} aborted`);
      }
      throw err;
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
