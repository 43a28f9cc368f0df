/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { EngineJobStatus, Job, JobState } from '@cellflow/types';
import { isTerminal } from '@cellflow/types';
import { DuplicateJobError, JobNotSubmittedError } from '../errors.js';
import type { EngineLimits, ExecutionEngine } from './interfaces.js';

/**
 * Configured outcome of a mock job.
 */
export interface MockJobOutcome {
  /** Exit code once the job terminates (default: 0) */
  exitCode?: number;
  /** Number of progress() calls the job stays running (default: 1) */
  ticks?: number;
  /** End in the stopped state instead of terminating */
  stopped?: boolean;
}

interface MockJob {
  job: Job;
  dependsOn: string[];
  state: JobState;
  exitCode: number | null;
  remaining: number;
  elapsed: number;
}

/**
 * ExecutionEngine mock for testing the scheduler without spawning processes.
 *
 * Every progress() call advances all jobs by one tick:
 * 1. running jobs count down their ticks and terminate at zero
 * 2. created jobs become submitted, up to maxSubmitted active jobs
 * 3. submitted jobs with terminal dependencies start, up to maxInFlight
 *    (or stop, if a dependency failed)
 *
 * Each tick counts as one second of elapsed time.
 */
export class MockExecutionEngine implements ExecutionEngine {
  private readonly jobs = new Map<string, MockJob>();
  private readonly outcomes = new Map<string, MockJobOutcome>();
  private limits: EngineLimits = { maxSubmitted: Infinity, maxInFlight: Infinity };
  private progressError: Error | null = null;

  /** Number of progress() calls so far */
  progressCalls = 0;
  /** Limits passed to configure(), in order */
  readonly configureCalls: EngineLimits[] = [];
  /** Highest number of simultaneously running jobs observed */
  peakRunning = 0;

  /**
   * Set the outcome of a job by name.
   */
  setOutcome(name: string, outcome: MockJobOutcome): void {
    this.outcomes.set(name, outcome);
  }

  /**
   * Make the next progress() call reject with the given error.
   */
  failNextProgress(error: Error): void {
    this.progressError = error;
  }

  /** Names of the registered jobs with their dependencies */
  getSubmitted(): { name: string; dependsOn: string[] }[] {
    return [...this.jobs.values()].map((e) => ({ name: e.job.name, dependsOn: [...e.dependsOn] }));
  }

  configure(limits: EngineLimits): void {
    this.limits = { ...limits };
    this.configureCalls.push({ ...limits });
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async submit(job: Job, dependsOn: readonly Job[] = []): Promise<void> {
    if (this.jobs.has(job.name)) {
      throw new DuplicateJobError(job.name);
    }
    for (const dependency of dependsOn) {
      this.entry(dependency.name);
    }
    this.jobs.set(job.name, {
      job,
      dependsOn: dependsOn.map((d) => d.name),
      state: 'created',
      exitCode: null,
      remaining: this.outcomes.get(job.name)?.ticks ?? 1,
      elapsed: 0,
    });
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async progress(): Promise<void> {
    this.progressCalls++;
    if (this.progressError) {
      const error = this.progressError;
      this.progressError = null;
      throw error;
    }

    const entries = [...this.jobs.values()];

    for (const entry of entries) {
      if (entry.state !== 'running') continue;
      entry.elapsed++;
      entry.remaining--;
      if (entry.remaining <= 0) {
        const outcome = this.outcomes.get(entry.job.name) ?? {};
        entry.exitCode = outcome.exitCode ?? 0;
        entry.state = outcome.stopped ? 'stopped' : 'terminated';
      }
    }

    let active = entries.filter((e) => e.state === 'submitted' || e.state === 'running').length;
    for (const entry of entries) {
      if (active >= this.limits.maxSubmitted) break;
      if (entry.state === 'created') {
        entry.state = 'submitted';
        active++;
      }
    }

    let running = entries.filter((e) => e.state === 'running').length;
    for (const entry of entries) {
      if (entry.state !== 'submitted') continue;
      const dependencies = entry.dependsOn.map((name) => this.entry(name));
      if (!dependencies.every((d) => isTerminal(d.state))) continue;
      if (dependencies.some((d) => d.state === 'stopped' || d.exitCode !== 0)) {
        entry.state = 'stopped';
        continue;
      }
      if (running >= this.limits.maxInFlight) continue;
      entry.state = 'running';
      running++;
    }

    this.peakRunning = Math.max(this.peakRunning, running);
  }

  statusOf(job: Job): EngineJobStatus {
    const entry = this.entry(job.name);
    return {
      state: entry.state,
      exitCode: entry.exitCode,
      elapsedTime: entry.elapsed,
      cpuTime: entry.elapsed,
      maxMemory: null,
    };
  }

  private entry(name: string): MockJob {
    const entry = this.jobs.get(name);
    if (entry === undefined) {
      throw new JobNotSubmittedError(name);
    }
    return entry;
  }
}
