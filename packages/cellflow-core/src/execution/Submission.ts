/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { Job, JobState, StepJobs } from '@cellflow/types';
import { isTerminal } from '@cellflow/types';
import { CellflowError, SubmissionClosedError } from '../errors.js';

/** Aggregate state of a submission */
export type SubmissionState = 'created' | 'running' | 'terminated' | 'stopped';

/**
 * All jobs of one planning pass of a step, with their last known states.
 *
 * Aggregate state:
 * - created: no job has moved yet
 * - running: any job is not terminal
 * - stopped: all jobs are terminal and any was stopped
 * - terminated: all jobs terminated
 */
export class Submission {
  private readonly _run: Job[] = [];
  private _collect: Job | undefined;
  private readonly states = new Map<string, JobState>();

  constructor(
    readonly id: number,
    readonly step: string
  ) {}

  /**
   * Create a submission holding the jobs of a step.
   */
  static fromJobs(id: number, step: string, jobs: StepJobs): Submission {
    const submission = new Submission(id, step);
    for (const job of jobs.run) {
      submission.add(job);
    }
    if (jobs.collect) {
      submission.add(jobs.collect);
    }
    return submission;
  }

  get runJobs(): readonly Job[] {
    return this._run;
  }

  get collectJob(): Job | undefined {
    return this._collect;
  }

  /** All jobs, run jobs first */
  get jobs(): Job[] {
    return this._collect ? [...this._run, this._collect] : [...this._run];
  }

  /**
   * Add a job.
   *
   * @throws {SubmissionClosedError} If the submission already terminated
   */
  add(job: Job): void {
    const state = this.state;
    if (this.states.size > 0 && (state === 'terminated' || state === 'stopped')) {
      throw new SubmissionClosedError(this.id, job.name);
    }
    if (this.states.has(job.name)) {
      throw new CellflowError(`Job '${job.name}' is already part of submission ${this.id}`);
    }
    if (job.phase === 'collect') {
      if (this._collect) {
        throw new CellflowError(`Submission ${this.id} already has a collect job`);
      }
      this._collect = job;
    } else {
      this._run.push(job);
    }
    this.states.set(job.name, 'created');
  }

  /** Record the last known state of a job */
  update(name: string, state: JobState): void {
    if (!this.states.has(name)) {
      throw new CellflowError(`Job '${name}' is not part of submission ${this.id}`);
    }
    this.states.set(name, state);
  }

  stateOf(name: string): JobState | undefined {
    return this.states.get(name);
  }

  get state(): SubmissionState {
    const states = [...this.states.values()];
    if (states.every((s) => s === 'created')) {
      return states.length === 0 ? 'terminated' : 'created';
    }
    if (states.some((s) => !isTerminal(s))) {
      return 'running';
    }
    return states.includes('stopped') ? 'stopped' : 'terminated';
  }

  /** Whether every job reached a terminal state */
  get done(): boolean {
    const state = this.state;
    return state === 'terminated' || state === 'stopped';
  }
}
