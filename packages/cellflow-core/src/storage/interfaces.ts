/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Storage interfaces for cellflow.
 *
 * Abstracts the persistence of experiments and of job output fragments:
 * - Local*: Filesystem (default, for the CLI)
 * - InMemory*: For testing
 */

import type {
  DatasetData,
  DatasetType,
  DatasetValue,
  ExperimentRecord,
  JobStatusRow,
  SubmissionRecord,
} from '@cellflow/types';

/**
 * Registry of experiments, their submissions and job records.
 */
export interface ExperimentStore {
  /**
   * Register a new experiment.
   *
   * @param name - Display name
   * @param root - Experiment root directory (made absolute)
   */
  createExperiment(name: string, root: string): Promise<ExperimentRecord>;

  /** All experiments, ordered by id */
  listExperiments(): Promise<ExperimentRecord[]>;

  /**
   * Root directory of an experiment.
   *
   * @throws {ExperimentNotFoundError} If the experiment does not exist
   */
  getExperimentRootPath(experimentId: number): Promise<string>;

  /**
   * Create the record of a new submission and issue its id.
   *
   * @throws {ExperimentNotFoundError} If the experiment does not exist
   */
  createSubmissionRecord(experimentId: number, step: string): Promise<SubmissionRecord>;

  /**
   * Submissions of an experiment, ordered by id.
   *
   * @throws {ExperimentNotFoundError} If the experiment does not exist
   */
  listSubmissions(experimentId: number): Promise<SubmissionRecord[]>;

  /**
   * Replace the job records of a submission with the given status rows.
   *
   * @throws {SubmissionNotFoundError} If the submission does not exist
   */
  saveJobRecords(submissionId: number, rows: JobStatusRow[]): Promise<void>;

  /**
   * Job records of a submission, in the order they were saved.
   *
   * @throws {SubmissionNotFoundError} If the submission does not exist
   */
  listJobRecords(submissionId: number): Promise<JobStatusRow[]>;
}

/**
 * Hierarchical dataset files written by jobs.
 *
 * Paths inside a file are absolute and `/`-separated, e.g.
 * `/objects/cells/features/area`. Mutations may be buffered until
 * {@link FragmentStore.flush} is called.
 */
export interface FragmentStore {
  /** Whether a file, or a group or dataset inside it, exists */
  exists(file: string, path?: string): Promise<boolean>;

  /**
   * Names of the subgroups of a group.
   *
   * @throws {FragmentNotFoundError} If the file or group does not exist
   */
  listGroups(file: string, path: string): Promise<string[]>;

  /**
   * Names of the datasets of a group.
   *
   * @throws {FragmentNotFoundError} If the file or group does not exist
   */
  listDatasets(file: string, path: string): Promise<string[]>;

  /** @throws {FragmentNotFoundError} If the dataset does not exist */
  getType(file: string, path: string): Promise<DatasetType>;

  /** @throws {FragmentNotFoundError} If the dataset does not exist */
  getDimensions(file: string, path: string): Promise<number[]>;

  /** @throws {FragmentNotFoundError} If the dataset does not exist */
  read(file: string, path: string): Promise<DatasetData>;

  /**
   * Create (or replace) a dataset with the given contents, creating the file
   * and intermediate groups as needed.
   *
   * @throws {FragmentFormatError} If the values do not match dtype and shape
   */
  create(file: string, path: string, data: DatasetData): Promise<void>;

  /**
   * Create (or replace) a dataset filled with the default value of its type.
   */
  preallocate(file: string, path: string, dtype: DatasetType, shape: number[]): Promise<void>;

  /**
   * Write rows into an existing dataset, starting at row `offset`.
   *
   * @throws {FragmentNotFoundError} If the dataset does not exist
   * @throws {FragmentFormatError} If the rows do not fit the dataset
   */
  write(file: string, path: string, values: DatasetValue[], offset: number): Promise<void>;

  /** Delete a file (no error if it does not exist) */
  remove(file: string): Promise<void>;

  /** Persist buffered mutations */
  flush(): Promise<void>;
}
