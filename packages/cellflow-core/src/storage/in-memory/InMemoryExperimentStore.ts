/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * In-memory implementation of ExperimentStore for testing.
 */

import { resolve } from 'node:path';
import type { ExperimentRecord, JobStatusRow, SubmissionRecord } from '@cellflow/types';
import type { ExperimentStore } from '../interfaces.js';
import { ExperimentNotFoundError, SubmissionNotFoundError } from '../../errors.js';

export class InMemoryExperimentStore implements ExperimentStore {
  private readonly experiments = new Map<number, ExperimentRecord>();
  private readonly submissions = new Map<number, SubmissionRecord>();
  private readonly jobRecords = new Map<number, JobStatusRow[]>();
  private experimentCounter = 0;
  private submissionCounter = 0;

  async createExperiment(name: string, root: string): Promise<ExperimentRecord> {
    const record: ExperimentRecord = {
      id: ++this.experimentCounter,
      name,
      root: resolve(root),
      createdAt: new Date().toISOString(),
    };
    this.experiments.set(record.id, record);
    return { ...record };
  }

  async listExperiments(): Promise<ExperimentRecord[]> {
    return [...this.experiments.values()].map((r) => ({ ...r }));
  }

  async getExperimentRootPath(experimentId: number): Promise<string> {
    return this.experiment(experimentId).root;
  }

  async createSubmissionRecord(experimentId: number, step: string): Promise<SubmissionRecord> {
    this.experiment(experimentId);
    const record: SubmissionRecord = {
      id: ++this.submissionCounter,
      experimentId,
      step,
      createdAt: new Date().toISOString(),
    };
    this.submissions.set(record.id, record);
    this.jobRecords.set(record.id, []);
    return { ...record };
  }

  async listSubmissions(experimentId: number): Promise<SubmissionRecord[]> {
    this.experiment(experimentId);
    return [...this.submissions.values()]
      .filter((s) => s.experimentId === experimentId)
      .map((s) => ({ ...s }));
  }

  async saveJobRecords(submissionId: number, rows: JobStatusRow[]): Promise<void> {
    this.submission(submissionId);
    this.jobRecords.set(submissionId, rows.map((r) => ({ ...r })));
  }

  async listJobRecords(submissionId: number): Promise<JobStatusRow[]> {
    this.submission(submissionId);
    return (this.jobRecords.get(submissionId) ?? []).map((r) => ({ ...r }));
  }

  private experiment(experimentId: number): ExperimentRecord {
    const record = this.experiments.get(experimentId);
    if (record === undefined) {
      throw new ExperimentNotFoundError(experimentId);
    }
    return record;
  }

  private submission(submissionId: number): SubmissionRecord {
    const record = this.submissions.get(submissionId);
    if (record === undefined) {
      throw new SubmissionNotFoundError(submissionId);
    }
    return record;
  }
}
