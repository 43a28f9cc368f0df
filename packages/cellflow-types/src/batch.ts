/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Batch (job description) types.
 *
 * A batch describes the inputs and outputs of one job. Run batches are
 * processed in parallel; the optional collect batch fans their results in.
 */

/**
 * A collection of file paths stored under one key of a batch.
 *
 * Exactly one of three shapes is allowed, and the shape applies to every
 * element stored under the key:
 * - `string[]`: flat list of files
 * - `string[][]`: list of file lists (e.g. one list per channel)
 * - `Record<string, string[]>`: file lists keyed by name
 */
export type PathCollection = string[] | string[][] | Record<string, string[]>;

/** Inputs or outputs of a batch, keyed by name */
export type PathMap = Record<string, PathCollection>;

/** Name of the shape used by a {@link PathCollection} */
export type PathShape = 'flat' | 'nested' | 'mapping';

/**
 * Description of a single run job.
 */
export interface RunBatch {
  /** One-based job identifier (dense, 1..10^6) */
  id: number;
  inputs: PathMap;
  outputs: PathMap;
}

/**
 * Description of the collect job of a step.
 */
export interface CollectBatch {
  inputs: PathMap;
  outputs: PathMap;
  /** Input keys whose files are removed during collection */
  removals?: string[];
}

/**
 * All job descriptions of one step.
 */
export interface JobDescriptions {
  run: RunBatch[];
  collect?: CollectBatch;
}

/** Largest run job id; job file names reserve six digits for it */
export const MAX_RUN_JOBS = 1_000_000;
