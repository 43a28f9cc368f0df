/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Job creation from job descriptions, and job log lookup.
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type {
  Job,
  JobDescriptions,
  JobResourceOptions,
  ResourceRequest,
  StepJobs,
} from '@cellflow/types';
import { JobResourceError, LogNotFoundError } from '../errors.js';
import { listDirectory, naturalCompare, readTextIfExists } from '../fs-utils.js';
import { formatJobId } from './JobStore.js';

/** Defaults for the collect job */
export const DEFAULT_COLLECT_RESOURCES = {
  walltime: '02:00:00',
  memory: 4000,
} as const satisfies JobResourceOptions;

/**
 * Context shared by all jobs of a step.
 */
export interface JobContext {
  step: string;
  experimentId: number;
  /** Directory receiving job log files */
  logDir: string;
  /** Number of `-v` flags passed to each job (default: 0) */
  verbosity?: number;
  /** Command prefix, e.g. `['cellflow']` (default: none) */
  launcher?: readonly string[];
}

/**
 * Resources for the run and collect jobs of a step.
 */
export interface StepResourceOptions {
  run?: JobResourceOptions;
  collect?: JobResourceOptions;
}

/**
 * Parse a wall-time of the form `HH:MM:SS` into seconds.
 *
 * @throws {JobResourceError} If the value is not of that form
 */
export function parseWalltime(value: string): number {
  const match = /^(\d+):([0-5]\d):([0-5]\d)$/.exec(value);
  if (!match) {
    throw new JobResourceError('walltime', `'${value}' must have the format HH:MM:SS`);
  }
  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * Validate resource options and convert them to a resource request.
 *
 * @throws {JobResourceError} If any resource is invalid
 */
export function resolveResources(options: JobResourceOptions = {}): ResourceRequest {
  const request: ResourceRequest = {};
  if (options.walltime !== undefined) {
    request.walltime = parseWalltime(options.walltime);
  }
  if (options.memory !== undefined) {
    if (!Number.isInteger(options.memory) || options.memory <= 0) {
      throw new JobResourceError('memory', `${options.memory} must be a positive number of megabytes`);
    }
    request.memory = options.memory;
  }
  if (options.cores !== undefined) {
    if (!Number.isInteger(options.cores) || options.cores <= 0) {
      throw new JobResourceError('cores', `${options.cores} must be a positive integer`);
    }
    request.cores = options.cores;
  }
  return request;
}

function baseCommand(context: JobContext): string[] {
  const flags = Array.from({ length: context.verbosity ?? 0 }, () => '-v');
  return [...(context.launcher ?? []), context.step, ...flags, String(context.experimentId)];
}

/** Name of the run job with the given batch id */
export function runJobName(step: string, id: number): string {
  return `${step}_run_${formatJobId(id)}`;
}

/** Name of the collect job of a step */
export function collectJobName(step: string): string {
  return `${step}_collect`;
}

/**
 * Create the jobs of a step from its job descriptions.
 *
 * Run jobs execute `[launcher...] <step> [-v...] <experiment> run --job <id>`,
 * the collect job `[launcher...] <step> [-v...] <experiment> collect`.
 *
 * @throws {JobResourceError} If any resource is invalid
 */
export function createJobs(
  context: JobContext,
  descriptions: JobDescriptions,
  submissionId: number,
  resources: StepResourceOptions = {}
): StepJobs {
  const runResources = resolveResources(resources.run);
  const run: Job[] = descriptions.run.map((batch) => ({
    name: runJobName(context.step, batch.id),
    step: context.step,
    phase: 'run',
    batchId: batch.id,
    command: [...baseCommand(context), 'run', '--job', String(batch.id)],
    logDir: context.logDir,
    submissionId,
    resources: { ...runResources },
  }));

  if (!descriptions.collect) {
    return { run };
  }

  const collect: Job = {
    name: collectJobName(context.step),
    step: context.step,
    phase: 'collect',
    batchId: null,
    command: [...baseCommand(context), 'collect'],
    logDir: context.logDir,
    submissionId,
    resources: resolveResources({ ...DEFAULT_COLLECT_RESOURCES, ...resources.collect }),
  };
  return { run, collect };
}

/**
 * Log output of a job.
 */
export interface JobLogOutput {
  stdout: string;
  stderr: string;
  /** Path of the stdout log file */
  file: string;
}

/**
 * Read the most recent log output of a job.
 *
 * Log files are named `<job>_<timestamp>.out` and `.err`; the latest file in
 * natural order wins. A missing `.err` file reads as empty.
 *
 * @param logDir - Log directory of the step
 * @param step - Name of the step
 * @param jobId - Run job id, or null for the collect job
 * @throws {LogNotFoundError} If the job has no log files
 */
export async function readLogOutput(
  logDir: string,
  step: string,
  jobId: number | null
): Promise<JobLogOutput> {
  const name = jobId === null ? collectJobName(step) : runJobName(step, jobId);
  const prefix = `${name}_`;
  const outFiles = (await listDirectory(logDir))
    .filter((file) => file.startsWith(prefix) && file.endsWith('.out'))
    .sort(naturalCompare);

  const latest = outFiles.at(-1);
  if (latest === undefined) {
    throw new LogNotFoundError(jobId === null ? `collect job of step '${step}'` : `run job ${jobId} of step '${step}'`);
  }

  const file = join(logDir, latest);
  const stdout = await fs.readFile(file, 'utf-8');
  const stderr = (await readTextIfExists(file.replace(/\.out$/, '.err'))) ?? '';
  return { stdout, stderr, file };
}
