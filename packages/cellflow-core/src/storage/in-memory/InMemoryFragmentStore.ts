/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * In-memory implementation of FragmentStore for testing.
 */

import type { DatasetData, DatasetType, DatasetValue } from '@cellflow/types';
import type { FragmentStore } from '../interfaces.js';
import { FragmentTree } from '../fragment-tree.js';
import { FragmentNotFoundError } from '../../errors.js';

/**
 * Fragment store holding all files in memory.
 */
export class InMemoryFragmentStore implements FragmentStore {
  private readonly files = new Map<string, FragmentTree>();

  /** Names of all files, sorted */
  listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  async exists(file: string, path?: string): Promise<boolean> {
    const tree = this.files.get(file);
    if (tree === undefined) return false;
    return path === undefined || tree.exists(path);
  }

  async listGroups(file: string, path: string): Promise<string[]> {
    return this.open(file).listGroups(path);
  }

  async listDatasets(file: string, path: string): Promise<string[]> {
    return this.open(file).listDatasets(path);
  }

  async getType(file: string, path: string): Promise<DatasetType> {
    return this.open(file).dataset(path).dtype;
  }

  async getDimensions(file: string, path: string): Promise<number[]> {
    return [...this.open(file).dataset(path).shape];
  }

  async read(file: string, path: string): Promise<DatasetData> {
    const dataset = this.open(file).dataset(path);
    return { dtype: dataset.dtype, shape: [...dataset.shape], values: [...dataset.values] };
  }

  async create(file: string, path: string, data: DatasetData): Promise<void> {
    this.openOrCreate(file).create(path, data);
  }

  async preallocate(file: string, path: string, dtype: DatasetType, shape: number[]): Promise<void> {
    this.openOrCreate(file).preallocate(path, dtype, shape);
  }

  async write(file: string, path: string, values: DatasetValue[], offset: number): Promise<void> {
    this.open(file).write(path, values, offset);
  }

  async remove(file: string): Promise<void> {
    this.files.delete(file);
  }

  async flush(): Promise<void> {
    // Nothing is buffered
  }

  private open(file: string): FragmentTree {
    const tree = this.files.get(file);
    if (tree === undefined) {
      throw new FragmentNotFoundError(file);
    }
    return tree;
  }

  private openOrCreate(file: string): FragmentTree {
    let tree = this.files.get(file);
    if (tree === undefined) {
      tree = new FragmentTree(file);
      this.files.set(file, tree);
    }
    return tree;
  }
}
