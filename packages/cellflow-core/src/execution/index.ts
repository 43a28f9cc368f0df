/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Job execution.
 *
 * Provides the ExecutionEngine abstraction with local and mock engines.
 */

export type { ExecutionEngine, EngineLimits } from './interfaces.js';
export {
  LocalExecutionEngine,
  logTimestamp,
  type LocalExecutionEngineOptions,
} from './LocalExecutionEngine.js';
export { MockExecutionEngine, type MockJobOutcome } from './MockExecutionEngine.js';
export { Submission, type SubmissionState } from './Submission.js';
export { getCpuTime, getPeakMemory } from './processHelpers.js';
