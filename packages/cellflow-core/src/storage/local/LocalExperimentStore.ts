/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * File-based implementation of ExperimentStore.
 *
 * Persists records under the cellflow home directory:
 * - experiments/{id}.json - Experiment records
 * - experiments-counter - Last issued experiment id
 * - submissions/{id}.json - Submission records with their job records
 * - submissions-counter - Last issued submission id
 */

import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import type { ExperimentRecord, JobStatusRow, SubmissionRecord } from '@cellflow/types';
import type { ExperimentStore } from '../interfaces.js';
import {
  CellflowError,
  ExperimentNotFoundError,
  SubmissionNotFoundError,
} from '../../errors.js';
import { atomicWriteText, listDirectory, nextCounter, readTextIfExists } from '../../fs-utils.js';

const ExperimentSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  root: z.string(),
  createdAt: z.string(),
});

const JobStatusRowSchema = z.object({
  name: z.string(),
  phase: z.enum(['run', 'collect']),
  batchId: z.number().int().nullable(),
  submissionId: z.number().int(),
  state: z.enum(['created', 'submitted', 'running', 'terminated', 'stopped']),
  exitCode: z.number().int().nullable(),
  elapsedTime: z.number(),
  cpuTime: z.number().nullable(),
  maxMemory: z.number().nullable(),
});

const SubmissionFileSchema = z.object({
  id: z.number().int().positive(),
  experimentId: z.number().int().positive(),
  step: z.string(),
  createdAt: z.string(),
  jobs: z.array(JobStatusRowSchema),
});

type SubmissionFile = z.infer<typeof SubmissionFileSchema>;

function toSubmissionRecord(file: SubmissionFile): SubmissionRecord {
  return {
    id: file.id,
    experimentId: file.experimentId,
    step: file.step,
    createdAt: file.createdAt,
  };
}

/**
 * Experiment store for local filesystem persistence.
 *
 * @remarks
 * Uses atomic writes (write to temp, then rename). Not safe for concurrent
 * writers in separate processes.
 */
export class LocalExperimentStore implements ExperimentStore {
  /**
   * @param home - cellflow home directory (e.g., ~/.cellflow)
   */
  constructor(private readonly home: string) {}

  private get experimentsDir(): string {
    return join(this.home, 'experiments');
  }

  private get submissionsDir(): string {
    return join(this.home, 'submissions');
  }

  async createExperiment(name: string, root: string): Promise<ExperimentRecord> {
    const id = await nextCounter(join(this.home, 'experiments-counter'));
    const record: ExperimentRecord = {
      id,
      name,
      root: resolve(root),
      createdAt: new Date().toISOString(),
    };
    await atomicWriteText(join(this.experimentsDir, `${id}.json`), JSON.stringify(record, null, 2));
    return record;
  }

  async listExperiments(): Promise<ExperimentRecord[]> {
    const records: ExperimentRecord[] = [];
    for (const id of await this.listIds(this.experimentsDir)) {
      records.push(await this.readExperiment(id));
    }
    return records;
  }

  async getExperimentRootPath(experimentId: number): Promise<string> {
    return (await this.readExperiment(experimentId)).root;
  }

  async createSubmissionRecord(experimentId: number, step: string): Promise<SubmissionRecord> {
    await this.readExperiment(experimentId);
    const id = await nextCounter(join(this.home, 'submissions-counter'));
    const file: SubmissionFile = {
      id,
      experimentId,
      step,
      createdAt: new Date().toISOString(),
      jobs: [],
    };
    await this.writeSubmission(file);
    return toSubmissionRecord(file);
  }

  async listSubmissions(experimentId: number): Promise<SubmissionRecord[]> {
    await this.readExperiment(experimentId);
    const records: SubmissionRecord[] = [];
    for (const id of await this.listIds(this.submissionsDir)) {
      const file = await this.readSubmission(id);
      if (file.experimentId === experimentId) {
        records.push(toSubmissionRecord(file));
      }
    }
    return records;
  }

  async saveJobRecords(submissionId: number, rows: JobStatusRow[]): Promise<void> {
    const file = await this.readSubmission(submissionId);
    await this.writeSubmission({ ...file, jobs: rows });
  }

  async listJobRecords(submissionId: number): Promise<JobStatusRow[]> {
    return (await this.readSubmission(submissionId)).jobs;
  }

  private async listIds(dir: string): Promise<number[]> {
    return (await listDirectory(dir))
      .map((name) => /^(\d+)\.json$/.exec(name)?.[1])
      .filter((id): id is string => id !== undefined)
      .map(Number)
      .sort((a, b) => a - b);
  }

  private async readExperiment(experimentId: number): Promise<ExperimentRecord> {
    const path = join(this.experimentsDir, `${experimentId}.json`);
    const text = await readTextIfExists(path);
    if (text === null) {
      throw new ExperimentNotFoundError(experimentId);
    }
    return this.parse(path, text, ExperimentSchema);
  }

  private async readSubmission(submissionId: number): Promise<SubmissionFile> {
    const path = join(this.submissionsDir, `${submissionId}.json`);
    const text = await readTextIfExists(path);
    if (text === null) {
      throw new SubmissionNotFoundError(submissionId);
    }
    return this.parse(path, text, SubmissionFileSchema);
  }

  private async writeSubmission(file: SubmissionFile): Promise<void> {
    await fs.mkdir(this.submissionsDir, { recursive: true });
    await atomicWriteText(join(this.submissionsDir, `${file.id}.json`), JSON.stringify(file, null, 2));
  }

  private parse<T>(path: string, text: string, schema: z.ZodType<T>): T {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CellflowError(`Corrupt record '${path}': ${err instanceof Error ? err.message : String(err)}`);
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new CellflowError(`Corrupt record '${path}': ${result.error.issues.map((i) => i.message).join('; ')}`);
    }
    return result.data;
  }
}
