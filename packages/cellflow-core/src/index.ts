/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow core - Programmatic API for workflow planning and execution
 *
 * This package provides the business logic of cellflow: workflow
 * validation, batch planning, job persistence, job scheduling and dataset
 * fusion. It has no UI dependencies and can be used programmatically.
 */

// Workflow descriptions
export {
  validateStage,
  validateStep,
  stageDefinition,
  StepDescription,
  StageDescription,
  WorkflowDescription,
  type WorkflowDescriptionOptions,
  WorkflowDocumentSchema,
  parseWorkflowDocument,
  loadWorkflowDescription,
  dumpWorkflowDescription,
} from './workflow/index.js';

// Batch planning and job descriptions
export {
  BatchPlanner,
  type BatchPlannerOptions,
  StepPlannerRegistry,
  loadPlannerModules,
  type StepPlannerFactory,
  JobStore,
  formatJobId,
  DEFAULT_COLLECT_RESOURCES,
  createJobs,
  parseWalltime,
  resolveResources,
  readLogOutput,
  runJobName,
  collectJobName,
  type JobContext,
  type JobLogOutput,
  type StepResourceOptions,
  classifyPaths,
  pathShape,
  mapPaths,
  flattenPaths,
  toPathMap,
  validateBatchPaths,
  toRelative,
  toAbsolute,
  listInputFiles,
  listOutputFiles,
  type ClassifiedPaths,
} from './batches/index.js';

// Execution
export {
  type ExecutionEngine,
  type EngineLimits,
  LocalExecutionEngine,
  logTimestamp,
  type LocalExecutionEngineOptions,
  MockExecutionEngine,
  type MockJobOutcome,
  Submission,
  type SubmissionState,
} from './execution/index.js';

// Scheduling
export {
  JobScheduler,
  DEFAULT_SUBMIT_CAP,
  DEFAULT_MONITORING_INTERVAL,
  type JobSchedulerOptions,
  type SubmitOptions,
  type ProgressReport,
  type SubmissionResult,
  isFailed,
  failedJobs,
  countStates,
  formatDuration,
  formatStatusTable,
} from './scheduler/index.js';

// Fusion
export {
  fuseDatasets,
  mergeDatasets,
  discoverLayout,
  type FuseOptions,
  type FusionLayout,
} from './fusion/index.js';

// Storage
export {
  type ExperimentStore,
  type FragmentStore,
  FragmentTree,
  LocalExperimentStore,
  LocalFragmentStore,
  InMemoryExperimentStore,
  InMemoryFragmentStore,
} from './storage/index.js';

// Configuration
export {
  ConfigSchema,
  loadConfig,
  parseConfig,
  getConfigPath,
  defaultHome,
  type CellflowConfig,
} from './config.js';

// Errors
export {
  CellflowError,
  ValidationError,
  UnknownStageError,
  UnknownStepError,
  DuplicateStageError,
  DuplicateStepError,
  OrderViolationError,
  IncompleteStageError,
  MissingUpstreamStepError,
  StageLockedError,
  WorkflowDescriptionFormatError,
  DescriptionError,
  NoDescriptionsFoundError,
  DescriptionFileNotFoundError,
  DescriptionFormatError,
  PathShapeError,
  BatchIdError,
  LogNotFoundError,
  StepArgumentsError,
  CollectJobNotFoundError,
  UnknownStepPlannerError,
  DuplicateStepPlannerError,
  PlannerPluginError,
  JobResourceError,
  SubmissionClosedError,
  JobNotSubmittedError,
  DuplicateJobError,
  MonitorAbortedError,
  ExperimentNotFoundError,
  SubmissionNotFoundError,
  FragmentNotFoundError,
  FragmentFormatError,
  FusionError,
  FusionDataIncompleteError,
  FusionShapeError,
  ConfigError,
  isNotFoundError,
  isExistsError,
  wrapError,
} from './errors.js';
