/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Execution engine interface.
 *
 * Abstracts where jobs run, enabling:
 * - LocalExecutionEngine: Local child processes
 * - MockExecutionEngine: For testing the scheduler without spawning processes
 *
 * A cluster batch system can be plugged in by implementing the same interface.
 */

import type { EngineJobStatus, Job } from '@cellflow/types';

/**
 * Concurrency limits of an engine.
 */
export interface EngineLimits {
  /** Maximum number of jobs handed to the backend at once */
  maxSubmitted: number;
  /** Maximum number of jobs running at once */
  maxInFlight: number;
}

/**
 * Executes jobs and reports their status.
 *
 * The engine owns job execution; callers only register jobs and poll.
 * Jobs are never cancelled through this interface.
 */
export interface ExecutionEngine {
  /** Set the concurrency limits (advisory) */
  configure(limits: EngineLimits): void;

  /**
   * Register a job.
   *
   * A job with dependencies starts only after all of them are terminal, and
   * is stopped without running if any of them failed.
   *
   * @param job - Job to run
   * @param dependsOn - Previously registered jobs this job waits for
   */
  submit(job: Job, dependsOn?: readonly Job[]): Promise<void>;

  /**
   * Advance execution: start eligible jobs and refresh the status of all
   * registered jobs.
   */
  progress(): Promise<void>;

  /**
   * Status of a registered job as of the last call to progress().
   *
   * @throws {Error} If the job was never registered
   */
  statusOf(job: Job): EngineJobStatus;
}
