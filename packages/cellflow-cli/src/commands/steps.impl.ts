/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Core logic of the step commands (jobs, submit, log and the per-step
 * init/run/collect actions), separated from presentation for testing.
 */

import { join } from 'node:path';
import yaml from 'js-yaml';
import {
  JobStore,
  Submission,
  createJobs,
  loadWorkflowDescription,
  readLogOutput,
  resolveResources,
  validateStep,
  type BatchPlanner,
  type CellflowConfig,
  type ExperimentStore,
  type JobLogOutput,
  type StepPlannerRegistry,
} from '@cellflow/core';
import type { JobDescriptions, JobResourceOptions, StepName, SubmissionRecord } from '@cellflow/types';

/**
 * Log directory of a step in an experiment.
 */
export function stepLogLocation(root: string, step: string): string {
  return join(root, 'workflow', step, 'log');
}

/**
 * Job descriptions of a step, as YAML.
 *
 * @throws {UnknownStepError} If the step is not registered
 * @throws {NoDescriptionsFoundError} If the step was not planned
 */
export async function describeStep(store: ExperimentStore, experimentId: number, step: string): Promise<string> {
  const stepName = validateStep(step);
  const root = await store.getExperimentRootPath(experimentId);
  const descriptions = await new JobStore(root, stepName).readAll();
  return yaml.dump(descriptions, { noRefs: true });
}

/**
 * A submission ready to be handed to the scheduler.
 */
export interface PreparedSubmission {
  record: SubmissionRecord;
  submission: Submission;
}

/**
 * Create the jobs of a planned step and register a new submission for them.
 *
 * Overrides replace the configured run job resources.
 *
 * @throws {UnknownStepError} If the step is not registered
 * @throws {NoDescriptionsFoundError} If the step was not planned
 * @throws {JobResourceError} If any resource is invalid
 */
export async function prepareSubmission(
  store: ExperimentStore,
  config: CellflowConfig,
  experimentId: number,
  step: string,
  overrides: JobResourceOptions = {}
): Promise<PreparedSubmission> {
  const stepName: StepName = validateStep(step);
  const root = await store.getExperimentRootPath(experimentId);
  const descriptions = await new JobStore(root, stepName).readAll();

  const run: JobResourceOptions = { ...config.run };
  if (overrides.walltime !== undefined) run.walltime = overrides.walltime;
  if (overrides.memory !== undefined) run.memory = overrides.memory;
  if (overrides.cores !== undefined) run.cores = overrides.cores;

  // Fail before a submission id is issued
  resolveResources(run);
  resolveResources(config.collect);

  const record = await store.createSubmissionRecord(experimentId, stepName);
  const jobs = createJobs(
    {
      step: stepName,
      experimentId,
      logDir: stepLogLocation(root, stepName),
      verbosity: config.verbosity,
      launcher: config.launcher,
    },
    descriptions,
    record.id,
    { run, collect: config.collect }
  );
  return { record, submission: Submission.fromJobs(record.id, stepName, jobs) };
}

/**
 * Latest log output of a run job, or of the collect job when `jobId` is null.
 *
 * @throws {LogNotFoundError} If the job has no log files
 */
export async function readStepLog(
  store: ExperimentStore,
  experimentId: number,
  step: string,
  jobId: number | null
): Promise<JobLogOutput> {
  const stepName = validateStep(step);
  const root = await store.getExperimentRootPath(experimentId);
  return readLogOutput(stepLogLocation(root, stepName), stepName, jobId);
}

/**
 * Create the planner of a step for an experiment.
 *
 * @throws {UnknownStepPlannerError} If no planner module registers the step
 */
export async function openStepPlanner(
  store: ExperimentStore,
  registry: StepPlannerRegistry,
  config: CellflowConfig,
  experimentId: number,
  step: string,
  verbosity: number = config.verbosity
): Promise<BatchPlanner<unknown>> {
  const root = await store.getExperimentRootPath(experimentId);
  return registry.create(step, {
    experimentId,
    root,
    verbosity,
    launcher: config.launcher,
  });
}

/**
 * Where the arguments of a step come from.
 */
export interface StepArgsSource {
  /** Arguments as a JSON object */
  args?: string;
  /** Workflow description file containing the step */
  workflow?: string;
}

/**
 * Read the raw arguments of a step; none given means an empty object.
 *
 * @throws {Error} If both sources are given, the JSON is malformed or the workflow lacks the step
 */
export async function readStepArgs(step: string, source: StepArgsSource): Promise<unknown> {
  if (source.args !== undefined && source.workflow !== undefined) {
    throw new Error('Use either --args or --workflow, not both');
  }
  if (source.args !== undefined) {
    try {
      return JSON.parse(source.args);
    } catch (err) {
      throw new Error(`--args is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  if (source.workflow !== undefined) {
    const workflow = await loadWorkflowDescription(source.workflow);
    const description = workflow.steps().find((s) => s.name === step);
    if (description === undefined) {
      throw new Error(`Workflow '${source.workflow}' has no step '${step}'`);
    }
    return description.args;
  }
  return {};
}

/**
 * One-line summary of planned job descriptions.
 */
export function summarizeDescriptions(step: string, descriptions: JobDescriptions): string {
  const runs = descriptions.run.length;
  const jobs = `${runs} run job${runs === 1 ? '' : 's'}`;
  return `Planned ${jobs}${descriptions.collect ? ' and a collect job' : ''} for ${step}`;
}
