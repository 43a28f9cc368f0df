/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Batch planning for workflow steps.
 *
 * A step is planned once per submission: its configuration is turned into
 * run batches (processed in parallel) and an optional collect batch, which
 * are then persisted by the JobStore and wrapped into jobs. Each job calls
 * back into the planner of its step to process its batch.
 *
 * Directory layout of a step:
 * - <root>/workflow/<step>/job_descriptions - Job description files
 * - <root>/workflow/<step>/log - Job log files
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { z } from 'zod';
import {
  MAX_RUN_JOBS,
  type CollectBatch,
  type JobDescriptions,
  type RunBatch,
  type StepJobs,
} from '@cellflow/types';
import {
  BatchIdError,
  CollectJobNotFoundError,
  StepArgumentsError,
  isExistsError,
} from '../errors.js';
import { JobStore } from './JobStore.js';
import {
  createJobs,
  readLogOutput,
  type JobLogOutput,
  type StepResourceOptions,
} from './jobs.js';
import { flattenPaths, validateBatchPaths } from './paths.js';

/**
 * Options for creating a batch planner.
 */
export interface BatchPlannerOptions {
  experimentId: number;
  /** Experiment root directory */
  root: string;
  /** Number of `-v` flags passed to each job (default: 0) */
  verbosity?: number;
  /** Command prefix of the jobs of the step (default: none) */
  launcher?: readonly string[];
  /** Called for non-fatal problems (default: console.warn) */
  onWarning?: (message: string) => void;
}

/**
 * Base class of the planners of all steps.
 *
 * @typeParam TArgs - Arguments of the step
 *
 * @example
 * ```typescript
 * const CopyArgs = z.object({ files: z.array(z.string()), batchSize: z.number().int().default(10) });
 *
 * class CopyPlanner extends BatchPlanner<z.output<typeof CopyArgs>> {
 *   readonly step = 'metaextract';
 *   protected readonly argsSchema = CopyArgs;
 *
 *   protected createBatches(args) {
 *     const run = BatchPlanner.partition(args.files, args.batchSize).map((files, i) => ({
 *       id: i + 1,
 *       inputs: { images: files },
 *       outputs: { metadata: files.map((f) => `${f}.json`) },
 *     }));
 *     return { run };
 *   }
 *
 *   async runJob(batch) {
 *     await extractMetadata(batch.inputs.images, batch.outputs.metadata);
 *   }
 *
 *   async collectJobOutput() {}
 * }
 * ```
 */
export abstract class BatchPlanner<TArgs> {
  /** Name of the step */
  abstract readonly step: string;

  readonly experimentId: number;
  readonly root: string;
  readonly verbosity: number;
  readonly launcher: readonly string[];
  protected readonly onWarning: (message: string) => void;

  constructor(options: BatchPlannerOptions) {
    this.experimentId = options.experimentId;
    this.root = options.root;
    this.verbosity = options.verbosity ?? 0;
    this.launcher = options.launcher ?? [];
    this.onWarning = options.onWarning ?? ((message) => console.warn(`Warning: ${message}`));
  }

  /** Schema of the step arguments */
  protected abstract readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /**
   * Create the run batches and the optional collect batch of the step.
   *
   * Run batch ids must be 1..N in order.
   */
  protected abstract createBatches(args: TArgs): JobDescriptions;

  /**
   * Process a single run batch.
   */
  abstract runJob(batch: RunBatch): Promise<void>;

  /**
   * Collect the outputs of the run jobs, fusing them where needed.
   */
  abstract collectJobOutput(batch: CollectBatch): Promise<void>;

  get workflowLocation(): string {
    return join(this.root, 'workflow');
  }

  get stepLocation(): string {
    return join(this.workflowLocation, this.step);
  }

  get jobDescriptionsLocation(): string {
    return join(this.stepLocation, 'job_descriptions');
  }

  get logLocation(): string {
    return join(this.stepLocation, 'log');
  }

  /** Job store of the step */
  get jobStore(): JobStore {
    return new JobStore(this.root, this.step, this.jobDescriptionsLocation);
  }

  /**
   * Create the step, job descriptions and log directories.
   */
  async initStep(): Promise<void> {
    await fs.mkdir(this.workflowLocation, { recursive: true });
    try {
      await fs.mkdir(this.stepLocation);
    } catch (err) {
      if (!isExistsError(err)) {
        throw err;
      }
      this.onWarning(`Step directory '${this.stepLocation}' already exists`);
    }
    await fs.mkdir(this.jobDescriptionsLocation, { recursive: true });
    await fs.mkdir(this.logLocation, { recursive: true });
  }

  /**
   * Remove the step directory with all job descriptions and logs.
   */
  async teardownStep(): Promise<void> {
    await fs.rm(this.stepLocation, { recursive: true, force: true });
  }

  /**
   * Validate raw step arguments, e.g. those of a workflow description.
   *
   * @throws {StepArgumentsError} If the arguments do not match the schema
   */
  parseArgs(raw: unknown): TArgs {
    const result = this.argsSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new StepArgumentsError(
        this.step,
        result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      );
    }
    return result.data;
  }

  /**
   * Plan the step and write its job descriptions, replacing earlier ones.
   *
   * @throws {StepArgumentsError} If the arguments do not match the schema
   * @throws {BatchIdError} If run batch ids are not 1..N
   * @throws {PathShapeError} If a path collection is malformed
   */
  async init(rawArgs: unknown): Promise<JobDescriptions> {
    const descriptions = this.plan(this.parseArgs(rawArgs));
    await this.initStep();
    await this.jobStore.write(descriptions);
    return descriptions;
  }

  /**
   * Run the job with the given batch id from its stored description.
   *
   * @throws {DescriptionFileNotFoundError} If the job was never planned
   */
  async run(jobId: number): Promise<RunBatch> {
    const batch = await this.jobStore.readRun(jobId);
    await this.runJob(batch);
    return batch;
  }

  /**
   * Run the collect job, then delete the inputs named in its `removals`.
   *
   * @returns Deleted files
   * @throws {CollectJobNotFoundError} If the step has no collect job
   */
  async collect(): Promise<string[]> {
    const store = this.jobStore;
    const batch = await store.readCollect();
    if (batch === undefined) {
      throw new CollectJobNotFoundError(this.step, store.collectFile);
    }
    await this.collectJobOutput(batch);

    const removed: string[] = [];
    for (const key of batch.removals ?? []) {
      const collection = batch.inputs[key];
      if (collection === undefined) {
        this.onWarning(`Collect input '${key}' listed for removal does not exist`);
        continue;
      }
      for (const file of flattenPaths(key, collection)) {
        await fs.rm(file, { recursive: true, force: true });
        removed.push(file);
      }
    }
    return removed;
  }

  /**
   * Create and validate the job descriptions of the step.
   *
   * @throws {BatchIdError} If run batch ids are not 1..N or N exceeds 10^6
   * @throws {PathShapeError} If a path collection is malformed
   */
  plan(args: TArgs): JobDescriptions {
    const descriptions = this.createBatches(args);

    if (descriptions.run.length > MAX_RUN_JOBS) {
      throw new BatchIdError(`${descriptions.run.length} run jobs exceed the maximum of ${MAX_RUN_JOBS}`);
    }
    descriptions.run.forEach((batch, index) => {
      if (batch.id !== index + 1) {
        throw new BatchIdError(`expected id ${index + 1} at position ${index}, got ${batch.id}`);
      }
      validateBatchPaths(batch);
    });
    if (descriptions.collect) {
      validateBatchPaths(descriptions.collect);
    }

    return descriptions;
  }

  /**
   * Create the jobs of the step for a submission.
   *
   * @throws {JobResourceError} If any resource is invalid
   */
  createJobs(
    descriptions: JobDescriptions,
    submissionId: number,
    resources: StepResourceOptions = {}
  ): StepJobs {
    return createJobs(
      {
        step: this.step,
        experimentId: this.experimentId,
        logDir: this.logLocation,
        verbosity: this.verbosity,
        launcher: this.launcher,
      },
      descriptions,
      submissionId,
      resources
    );
  }

  /**
   * Read the most recent log output of a run job, or of the collect job
   * when `jobId` is null.
   *
   * @throws {LogNotFoundError} If the job has no log files
   */
  async readLogOutput(jobId: number | null): Promise<JobLogOutput> {
    return readLogOutput(this.logLocation, this.step, jobId);
  }

  /**
   * Split items into consecutive chunks of at most `size` elements.
   *
   * Sizes below 1 are treated as 1.
   */
  static partition<T>(items: readonly T[], size: number): T[][] {
    const chunkSize = Math.max(1, Math.floor(size));
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += chunkSize) {
      chunks.push(items.slice(i, i + chunkSize));
    }
    return chunks;
  }
}
