/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow-types: Shared type definitions for cellflow
 *
 * Terminology:
 * - **Stage**: Top-level workflow phase composed of ordered steps
 * - **Step**: Named processing unit, split into parallel run jobs and an
 *   optional collect job
 * - **Batch**: Serializable description of one job's inputs and outputs
 * - **Submission**: All jobs created by one planning-and-submit pass
 * - **Fragment**: One job's partial dataset output, merged by fusion
 */

// Stage/step registry
export {
  STAGE_NAMES,
  STEP_NAMES,
  STAGES,
  STEP_DEPENDENCIES,
  type StageName,
  type StepName,
  type StageDefinition,
  isStageName,
  isStepName,
  stageOfStep,
} from './registry.js';

// Workflow description documents
export type {
  StepArgs,
  StepDocument,
  StageDocument,
  WorkflowDocument,
} from './workflow.js';

// Batches
export {
  MAX_RUN_JOBS,
  type PathCollection,
  type PathMap,
  type PathShape,
  type RunBatch,
  type CollectBatch,
  type JobDescriptions,
} from './batch.js';

// Jobs and submissions
export {
  TERMINAL_STATES,
  isTerminal,
  type JobPhase,
  type JobState,
  type ResourceRequest,
  type JobResourceOptions,
  type StepJobs,
  type Job,
  type EngineJobStatus,
  type JobStatusRow,
  type SubmissionRecord,
  type ExperimentRecord,
} from './job.js';

// Fragment datasets
export {
  DATASET_TYPES,
  type DatasetType,
  type DatasetValue,
  type DatasetData,
  type DatasetInfo,
  type FusionSummary,
} from './fragment.js';
