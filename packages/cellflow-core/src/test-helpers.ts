/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for cellflow-core
 * Provides utilities for temporary directories, jobs and fragments
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DatasetValue, Job } from '@cellflow/types';
import type { FragmentStore } from './storage/interfaces.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'cellflow-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Creates a job with the given name for scheduler tests
 */
export function makeJob(name: string, overrides: Partial<Job> = {}): Job {
  return {
    name,
    step: 'jterator',
    phase: 'run',
    batchId: null,
    command: ['true'],
    logDir: '/tmp/cellflow-test-logs',
    submissionId: 1,
    resources: {},
    ...overrides,
  };
}

/**
 * Contents of a test fragment: metadata scalars and per-category columns
 */
export interface FragmentSpec {
  metadata?: Record<string, DatasetValue>;
  /** category -> `features/<name>` or `segmentation/[<group>/]<name>` -> column */
  objects?: Record<string, Record<string, number[]>>;
}

/**
 * Writes a fragment made of integer/float columns into a store
 */
export async function writeFragment(store: FragmentStore, file: string, spec: FragmentSpec): Promise<void> {
  for (const [name, value] of Object.entries(spec.metadata ?? {})) {
    const dtype = typeof value === 'string' ? 'string' : typeof value === 'boolean' ? 'bool' : Number.isInteger(value) ? 'int' : 'float';
    await store.create(file, `/metadata/${name}`, { dtype, shape: [1], values: [value] });
  }
  for (const [category, columns] of Object.entries(spec.objects ?? {})) {
    for (const [name, values] of Object.entries(columns)) {
      const dtype = values.every((v) => Number.isInteger(v)) ? 'int' : 'float';
      await store.create(file, `/objects/${category}/${name}`, { dtype, shape: [values.length], values });
    }
  }
  await store.flush();
}
