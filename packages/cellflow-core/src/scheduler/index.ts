/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export {
  JobScheduler,
  DEFAULT_SUBMIT_CAP,
  DEFAULT_MONITORING_INTERVAL,
  type JobSchedulerOptions,
  type SubmitOptions,
  type ProgressReport,
  type SubmissionResult,
} from './JobScheduler.js';
export {
  isFailed,
  failedJobs,
  countStates,
  formatDuration,
  formatStatusTable,
} from './report.js';
