/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Domain error types for cellflow-core.
 *
 * All cellflow errors extend CellflowError, allowing callers to catch all
 * domain errors with `if (err instanceof CellflowError)` or a whole family
 * with its intermediate class (ValidationError, DescriptionError, FusionError).
 */

import type { JobStatusRow } from '@cellflow/types';

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all cellflow errors */
export class CellflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Workflow Validation Errors
// =============================================================================

/** Raised before any job is created when a workflow description is invalid */
export class ValidationError extends CellflowError {}

export class UnknownStageError extends ValidationError {
  constructor(
    public readonly stage: string,
    public readonly known: readonly string[]
  ) {
    super(`Unknown stage '${stage}'. Known stages are: ${known.join(', ')}`);
  }
}

export class UnknownStepError extends ValidationError {
  constructor(
    public readonly step: string,
    public readonly known: readonly string[],
    public readonly stage?: string
  ) {
    super(
      stage
        ? `Unknown step '${step}' for stage '${stage}'. Known steps are: ${known.join(', ')}`
        : `Unknown step '${step}'. Known steps are: ${known.join(', ')}`
    );
  }
}

export class DuplicateStageError extends ValidationError {
  constructor(public readonly stage: string) {
    super(`Stage '${stage}' already exists`);
  }
}

export class DuplicateStepError extends ValidationError {
  constructor(
    public readonly step: string,
    public readonly stage: string
  ) {
    super(`Step '${step}' already exists in stage '${stage}'`);
  }
}

export class OrderViolationError extends ValidationError {
  constructor(
    public readonly stage: string,
    public readonly downstream: string
  ) {
    super(`Stage '${stage}' must be upstream of stage '${downstream}'`);
  }
}

export class IncompleteStageError extends ValidationError {
  constructor(
    public readonly stage: string,
    public readonly missing: readonly string[]
  ) {
    super(`Stage '${stage}' requires the following steps: ${missing.join(', ')}`);
  }
}

export class MissingUpstreamStepError extends ValidationError {
  constructor(
    public readonly step: string,
    public readonly upstream: string
  ) {
    super(`Step '${step}' requires upstream step '${upstream}'`);
  }
}

export class StageLockedError extends ValidationError {
  constructor(public readonly stage: string) {
    super(`Stage '${stage}' is part of a workflow and can no longer change`);
  }
}

export class WorkflowDescriptionFormatError extends ValidationError {
  constructor(
    public readonly source: string,
    public readonly reason: string
  ) {
    super(`Invalid workflow description '${source}': ${reason}`);
  }
}

// =============================================================================
// Job Description Errors
// =============================================================================

/** Raised when job descriptions are missing or malformed; re-run planning */
export class DescriptionError extends CellflowError {}

export class NoDescriptionsFoundError extends DescriptionError {
  constructor(public readonly location: string) {
    super(`No job description files found in '${location}'`);
  }
}

export class DescriptionFileNotFoundError extends DescriptionError {
  constructor(public readonly path: string) {
    super(
      `Job description file does not exist: '${path}'. ` +
      'Initialize the step first by planning its batches.'
    );
  }
}

export class DescriptionFormatError extends DescriptionError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Invalid job description '${path}': ${reason}`);
  }
}

export class PathShapeError extends DescriptionError {
  constructor(
    public readonly key: string,
    public readonly reason: string
  ) {
    super(`Value of '${key}' must be a list of paths, a list of path lists or a mapping of path lists: ${reason}`);
  }
}

export class BatchIdError extends DescriptionError {
  constructor(public readonly reason: string) {
    super(`Invalid run batch ids: ${reason}`);
  }
}

export class LogNotFoundError extends DescriptionError {
  constructor(public readonly job: string) {
    super(`No log files found for ${job}`);
  }
}

export class StepArgumentsError extends DescriptionError {
  constructor(
    public readonly step: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid arguments for step '${step}': ${issues.join('; ')}`);
  }
}

export class CollectJobNotFoundError extends DescriptionError {
  constructor(
    public readonly step: string,
    public readonly path: string
  ) {
    super(`Step '${step}' has no collect job description at '${path}'`);
  }
}

// =============================================================================
// Step Planner Registry Errors
// =============================================================================

export class UnknownStepPlannerError extends CellflowError {
  constructor(
    public readonly step: string,
    public readonly registered: readonly string[]
  ) {
    super(
      `No planner is registered for step '${step}'. ` +
      (registered.length > 0 ? `Registered steps: ${registered.join(', ')}` : 'Add a planner module to the configuration.')
    );
  }
}

export class DuplicateStepPlannerError extends CellflowError {
  constructor(public readonly step: string) {
    super(`A planner is already registered for step '${step}'`);
  }
}

export class PlannerPluginError extends CellflowError {
  constructor(
    public readonly specifier: string,
    public readonly reason: string
  ) {
    super(`Cannot load planner module '${specifier}': ${reason}`);
  }
}

// =============================================================================
// Job Errors
// =============================================================================

export class JobResourceError extends CellflowError {
  constructor(
    public readonly resource: string,
    public readonly reason: string
  ) {
    super(`Invalid ${resource} request: ${reason}`);
  }
}

export class SubmissionClosedError extends CellflowError {
  constructor(
    public readonly submissionId: number,
    public readonly job: string
  ) {
    super(`Cannot add job '${job}' to submission ${submissionId}: submission already terminated`);
  }
}

export class JobNotSubmittedError extends CellflowError {
  constructor(public readonly job: string) {
    super(`Job '${job}' was not submitted to this engine`);
  }
}

export class DuplicateJobError extends CellflowError {
  constructor(public readonly job: string) {
    super(`Job '${job}' was already submitted`);
  }
}

/**
 * Thrown when job monitoring is aborted via AbortSignal.
 *
 * Jobs keep running in the execution engine. The last status table is
 * attached so callers can report what was observed.
 */
export class MonitorAbortedError extends CellflowError {
  constructor(public readonly lastStatus: JobStatusRow[]) {
    super('Job monitoring was aborted');
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

export class ExperimentNotFoundError extends CellflowError {
  constructor(public readonly experimentId: number) {
    super(`Experiment ${experimentId} does not exist`);
  }
}

export class SubmissionNotFoundError extends CellflowError {
  constructor(public readonly submissionId: number) {
    super(`Submission ${submissionId} does not exist`);
  }
}

export class FragmentNotFoundError extends CellflowError {
  constructor(
    public readonly file: string,
    public readonly path?: string
  ) {
    super(path ? `'${path}' not found in fragment '${file}'` : `Fragment '${file}' not found`);
  }
}

export class FragmentFormatError extends CellflowError {
  constructor(
    public readonly file: string,
    public readonly reason: string
  ) {
    super(`Invalid fragment '${file}': ${reason}`);
  }
}

// =============================================================================
// Fusion Errors
// =============================================================================

/** Raised during fusion; partial output must be discarded by the caller */
export class FusionError extends CellflowError {}

export class FusionDataIncompleteError extends FusionError {
  constructor(
    public readonly file: string,
    public readonly category: string
  ) {
    super(`Features or segmentation data must exist for objects '${category}' in '${file}'`);
  }
}

export class FusionShapeError extends FusionError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Dataset '${path}' cannot be fused: ${reason}`);
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends CellflowError {
  constructor(
    public readonly source: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid configuration '${source}': ${issues.join('; ')}`);
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/** Check if error is EEXIST (already exists) */
export function isExistsError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'EEXIST'
  );
}

/** Wrap unknown errors with context */
export function wrapError(err: unknown, message: string): CellflowError {
  if (err instanceof CellflowError) return err;
  const cause = err instanceof Error ? err.message : String(err);
  return new CellflowError(`${message}: ${cause}`);
}
