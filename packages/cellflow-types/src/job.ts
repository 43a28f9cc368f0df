/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Job, submission and status types.
 */

/** Phase of a step a job belongs to */
export type JobPhase = 'run' | 'collect';

/**
 * Lifecycle state of a job.
 *
 * created -> submitted -> running -> terminated | stopped
 */
export type JobState = 'created' | 'submitted' | 'running' | 'terminated' | 'stopped';

/** Terminal job states */
export const TERMINAL_STATES: readonly JobState[] = ['terminated', 'stopped'];

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * Resources requested for a job.
 */
export interface ResourceRequest {
  /** Wall-time in seconds */
  walltime?: number;
  /** Memory in megabytes */
  memory?: number;
  /** Number of CPU cores */
  cores?: number;
}

/**
 * A submittable unit of work wrapping one batch.
 */
export interface Job {
  /** Unique name, e.g. `jterator_run_000001` or `jterator_collect` */
  name: string;
  /** Step the job belongs to */
  step: string;
  phase: JobPhase;
  /** Batch id for run jobs, null for the collect job */
  batchId: number | null;
  /** Command line (argv) executed by the job */
  command: string[];
  /** Directory receiving the job's stdout/stderr log files */
  logDir: string;
  /** Id of the submission that created the job */
  submissionId: number;
  resources: ResourceRequest;
}

/**
 * Status of a job as reported by an execution engine.
 */
export interface EngineJobStatus {
  state: JobState;
  /** Process exit code, null until the job terminates */
  exitCode: number | null;
  /** Wall-clock time in seconds */
  elapsedTime: number;
  /** CPU time in seconds, null if unavailable */
  cpuTime: number | null;
  /** Peak resident memory in megabytes, null if unavailable */
  maxMemory: number | null;
}

/**
 * One row of the status table reported by the scheduler.
 *
 * Rows are also persisted as the job records of a submission.
 */
export interface JobStatusRow extends EngineJobStatus {
  name: string;
  phase: JobPhase;
  batchId: number | null;
  submissionId: number;
}

/**
 * Persisted submission record.
 */
export interface SubmissionRecord {
  id: number;
  experimentId: number;
  step: string;
  /** When the submission was created (ISO 8601) */
  createdAt: string;
}

/**
 * Persisted experiment record.
 */
export interface ExperimentRecord {
  id: number;
  name: string;
  /** Absolute path to the experiment root directory */
  root: string;
  /** When the experiment was registered (ISO 8601) */
  createdAt: string;
}

/**
 * Resource options as configured by a user, before parsing.
 */
export interface JobResourceOptions {
  /** Wall-time as `HH:MM:SS` */
  walltime?: string;
  /** Memory in megabytes */
  memory?: number;
  /** Number of CPU cores */
  cores?: number;
}

/**
 * Jobs created for one step: parallel run jobs and the optional collect job.
 */
export interface StepJobs {
  run: Job[];
  collect?: Job;
}
