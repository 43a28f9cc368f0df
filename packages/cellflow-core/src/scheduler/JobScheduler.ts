/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Submission and monitoring of step jobs.
 *
 * The scheduler hands all jobs of a submission to an execution engine, with
 * the collect job depending on every run job, then polls the engine until
 * the submission terminates. Failing jobs never stop the loop; they are
 * reported once it ends.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Job, JobStatusRow } from '@cellflow/types';
import { MonitorAbortedError } from '../errors.js';
import type { ExecutionEngine } from '../execution/interfaces.js';
import type { Submission, SubmissionState } from '../execution/Submission.js';
import type { ExperimentStore } from '../storage/interfaces.js';
import { failedJobs } from './report.js';

/** Default number of jobs submitted and in flight at once */
export const DEFAULT_SUBMIT_CAP = 2000;

/** Default seconds between status polls */
export const DEFAULT_MONITORING_INTERVAL = 5;

/**
 * Status of a submission after one poll.
 */
export interface ProgressReport {
  submissionId: number;
  step: string;
  state: SubmissionState;
  /** One-based poll number */
  iteration: number;
  rows: JobStatusRow[];
}

/**
 * Outcome of a submission.
 */
export interface SubmissionResult {
  submissionId: number;
  state: SubmissionState;
  rows: JobStatusRow[];
  failed: JobStatusRow[];
}

/**
 * Options for creating a scheduler.
 */
export interface JobSchedulerOptions {
  engine: ExecutionEngine;
  /** Receives the status rows after every poll */
  store?: ExperimentStore;
  /** Seconds between polls (default: 5) */
  interval?: number;
  /** Wait between polls; rejects when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Called after every poll */
  onProgress?: (report: ProgressReport) => void;
  /** Called once with the failed jobs, if there are any */
  onFailure?: (failed: JobStatusRow[]) => void;
}

/**
 * Options for a single submission.
 */
export interface SubmitOptions {
  /** Maximum number of jobs submitted and in flight (default: 2000) */
  cap?: number;
  /** Stops monitoring (not the jobs) when aborted */
  signal?: AbortSignal;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, { signal });
};

/**
 * Runs submissions on an execution engine.
 *
 * @example
 * ```typescript
 * const scheduler = new JobScheduler({
 *   engine: new LocalExecutionEngine(),
 *   onProgress: (report) => console.log(formatStatusTable(report.rows)),
 * });
 * const result = await scheduler.submit(Submission.fromJobs(id, step, jobs));
 * ```
 */
export class JobScheduler {
  private readonly engine: ExecutionEngine;
  private readonly store: ExperimentStore | undefined;
  private readonly interval: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly onProgress: (report: ProgressReport) => void;
  private readonly onFailure: (failed: JobStatusRow[]) => void;

  constructor(options: JobSchedulerOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.interval = options.interval ?? DEFAULT_MONITORING_INTERVAL;
    this.sleep = options.sleep ?? defaultSleep;
    this.onProgress = options.onProgress ?? (() => {});
    this.onFailure = options.onFailure ?? (() => {});
  }

  /**
   * Submit all jobs of a submission and monitor them until they terminate.
   *
   * Polling continues for one more iteration after the submission first
   * reaches a terminal state, so the final report is up to date.
   *
   * @throws {MonitorAbortedError} If the signal aborts; jobs keep running
   */
  async submit(submission: Submission, options: SubmitOptions = {}): Promise<SubmissionResult> {
    const cap = options.cap ?? DEFAULT_SUBMIT_CAP;
    const signal = options.signal;

    this.engine.configure({ maxSubmitted: cap, maxInFlight: cap });
    for (const job of submission.runJobs) {
      await this.engine.submit(job);
    }
    const collect = submission.collectJob;
    if (collect) {
      await this.engine.submit(collect, submission.runJobs);
    }

    let rows: JobStatusRow[] = [];
    let iteration = 0;
    let finalPass = false;

    while (true) {
      try {
        await this.sleep(this.interval * 1000, signal);
      } catch (err) {
        if (signal?.aborted) throw new MonitorAbortedError(rows);
        throw err;
      }
      if (signal?.aborted) {
        throw new MonitorAbortedError(rows);
      }

      await this.engine.progress();
      rows = this.collectStatus(submission);
      if (this.store) {
        await this.store.saveJobRecords(submission.id, rows);
      }

      iteration++;
      this.onProgress({
        submissionId: submission.id,
        step: submission.step,
        state: submission.state,
        iteration,
        rows,
      });

      if (finalPass) break;
      if (submission.done) {
        finalPass = true;
        await this.engine.progress();
      }
    }

    const failed = failedJobs(rows);
    if (failed.length > 0) {
      this.onFailure(failed);
    }
    return { submissionId: submission.id, state: submission.state, rows, failed };
  }

  private collectStatus(submission: Submission): JobStatusRow[] {
    return submission.jobs.map((job: Job) => {
      const status = this.engine.statusOf(job);
      submission.update(job.name, status.state);
      return {
        name: job.name,
        phase: job.phase,
        batchId: job.batchId,
        submissionId: job.submissionId,
        ...status,
      };
    });
  }
}
