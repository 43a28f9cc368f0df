/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Persistent job descriptions of a step.
 *
 * Layout of the job descriptions directory:
 * - {step}_run_{id:06d}.job.json - One file per run batch (seven digits for 10^6)
 * - {step}_collect.job.json - The collect batch, if the step has one
 *
 * Paths are stored relative to the experiment root and made absolute again
 * when read.
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { CollectBatch, JobDescriptions, RunBatch } from '@cellflow/types';
import {
  BatchIdError,
  DescriptionFileNotFoundError,
  DescriptionFormatError,
  NoDescriptionsFoundError,
  isNotFoundError,
} from '../errors.js';
import { atomicWriteText, listDirectory } from '../fs-utils.js';
import { toAbsolute, toPathMap, toRelative, validateBatchPaths } from './paths.js';

const RunFileSchema = z.object({
  id: z.number().int().positive(),
  inputs: z.record(z.string(), z.unknown()),
  outputs: z.record(z.string(), z.unknown()),
});

const CollectFileSchema = z.object({
  inputs: z.record(z.string(), z.unknown()),
  outputs: z.record(z.string(), z.unknown()),
  removals: z.array(z.string()).optional(),
});

/** Zero-padded run job id as used in file and job names */
export function formatJobId(id: number): string {
  return String(id).padStart(6, '0');
}

/**
 * Reads and writes the job description files of one step.
 *
 * @example
 * ```typescript
 * const store = new JobStore('/data/exp1', 'jterator');
 * await store.write(planner.plan(args));
 * const { run, collect } = await store.readAll();
 * ```
 */
export class JobStore {
  /**
   * @param root - Experiment root directory; stored paths are relative to it
   * @param step - Name of the step
   * @param location - Job descriptions directory
   *   (default: `<root>/workflow/<step>/job_descriptions`)
   */
  constructor(
    private readonly root: string,
    private readonly step: string,
    readonly location: string = join(root, 'workflow', step, 'job_descriptions')
  ) {}

  runFile(id: number): string {
    return join(this.location, `${this.step}_run_${formatJobId(id)}.job.json`);
  }

  get collectFile(): string {
    return join(this.location, `${this.step}_collect.job.json`);
  }

  private get runFilePattern(): RegExp {
    return new RegExp(`^${escapeRegExp(this.step)}_run_(\\d{6,})\\.job\\.json$`);
  }

  /**
   * Write all job descriptions of the step, replacing those of an earlier
   * planning pass.
   *
   * @throws {PathShapeError} If any batch has a malformed path collection
   */
  async write(descriptions: JobDescriptions): Promise<void> {
    for (const batch of descriptions.run) {
      validateBatchPaths(batch);
    }
    if (descriptions.collect) {
      validateBatchPaths(descriptions.collect);
    }

    await fs.mkdir(this.location, { recursive: true });
    await this.clear();

    for (const batch of descriptions.run) {
      await this.writeFile(this.runFile(batch.id), toRelative(batch, this.root));
    }
    if (descriptions.collect) {
      await this.writeFile(this.collectFile, toRelative(descriptions.collect, this.root));
    }
  }

  /**
   * Read all job descriptions of the step, run batches sorted by id.
   *
   * @throws {NoDescriptionsFoundError} If there are no run job descriptions
   * @throws {BatchIdError} If the run batch ids are not 1..N
   */
  async readAll(): Promise<JobDescriptions> {
    const pattern = this.runFilePattern;
    const files = (await listDirectory(this.location))
      .filter((name) => pattern.test(name))
      .sort();

    if (files.length === 0) {
      throw new NoDescriptionsFoundError(this.location);
    }

    const run: RunBatch[] = [];
    for (const name of files) {
      run.push(await this.readRunFile(join(this.location, name)));
    }
    run.sort((a, b) => a.id - b.id);
    run.forEach((batch, index) => {
      if (batch.id !== index + 1) {
        throw new BatchIdError(`expected id ${index + 1} at position ${index}, got ${batch.id}`);
      }
    });

    const collect = await this.readCollect();
    return collect ? { run, collect } : { run };
  }

  /**
   * Read a single job description file.
   *
   * Files whose content has an `id` are run batches; all others are collect
   * batches.
   *
   * @throws {DescriptionFileNotFoundError} If the file does not exist
   * @throws {DescriptionFormatError} If the file is not a job description
   * @throws {PathShapeError} If a path collection is malformed
   */
  async read(file: string): Promise<RunBatch | CollectBatch> {
    const raw = await this.readJson(file);
    if (typeof raw === 'object' && raw !== null && 'id' in raw) {
      return this.parseRun(file, raw);
    }
    return this.parseCollect(file, raw);
  }

  /**
   * Read the description of one run job.
   *
   * @throws {DescriptionFileNotFoundError} If the file does not exist
   */
  async readRun(id: number): Promise<RunBatch> {
    return this.readRunFile(this.runFile(id));
  }

  /**
   * Read the collect job description, or undefined if the step has none.
   */
  async readCollect(): Promise<CollectBatch | undefined> {
    try {
      return this.parseCollect(this.collectFile, await this.readJson(this.collectFile));
    } catch (err) {
      if (err instanceof DescriptionFileNotFoundError) {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Delete all job description files of the step.
   *
   * @returns Number of deleted files
   */
  async clear(): Promise<number> {
    const pattern = this.runFilePattern;
    const collectName = `${this.step}_collect.job.json`;
    let removed = 0;
    for (const name of await listDirectory(this.location)) {
      if (pattern.test(name) || name === collectName) {
        await fs.rm(join(this.location, name), { force: true });
        removed++;
      }
    }
    return removed;
  }

  private async readRunFile(file: string): Promise<RunBatch> {
    return this.parseRun(file, await this.readJson(file));
  }

  private parseRun(file: string, raw: unknown): RunBatch {
    const result = RunFileSchema.safeParse(raw);
    if (!result.success) {
      throw new DescriptionFormatError(file, formatIssues(result.error));
    }
    const batch: RunBatch = {
      id: result.data.id,
      inputs: toPathMap('inputs', result.data.inputs),
      outputs: toPathMap('outputs', result.data.outputs),
    };
    return toAbsolute(batch, this.root);
  }

  private parseCollect(file: string, raw: unknown): CollectBatch {
    const result = CollectFileSchema.safeParse(raw);
    if (!result.success) {
      throw new DescriptionFormatError(file, formatIssues(result.error));
    }
    const batch: CollectBatch = {
      inputs: toPathMap('inputs', result.data.inputs),
      outputs: toPathMap('outputs', result.data.outputs),
    };
    if (result.data.removals) {
      batch.removals = result.data.removals;
    }
    return toAbsolute(batch, this.root);
  }

  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) {
        throw new DescriptionFileNotFoundError(file);
      }
      throw err;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new DescriptionFormatError(file, err instanceof Error ? err.message : String(err));
    }
  }

  private async writeFile(file: string, batch: RunBatch | CollectBatch): Promise<void> {
    await atomicWriteText(file, JSON.stringify(batch, null, 2) + '\n');
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
