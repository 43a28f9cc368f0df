/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { BatchPlanner, type BatchPlannerOptions } from './planner.js';
export {
  StepPlannerRegistry,
  loadPlannerModules,
  type StepPlannerFactory,
} from './step-planners.js';
export { JobStore, formatJobId } from './JobStore.js';
export {
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
} from './jobs.js';
export {
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
} from './paths.js';
