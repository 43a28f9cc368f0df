/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Local filesystem implementation of FragmentStore.
 *
 * Each fragment file holds one JSON document:
 *
 * ```json
 * { "format": "cellflow-fragment", "version": 1,
 *   "root": { "groups": { ... }, "datasets": { "<name>": { "dtype", "shape", "values" } } } }
 * ```
 *
 * Files are loaded once and cached; mutations are written back atomically
 * on flush().
 */

import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import type { DatasetData, DatasetType, DatasetValue } from '@cellflow/types';
import type { FragmentStore } from '../interfaces.js';
import { FragmentTree } from '../fragment-tree.js';
import { FragmentFormatError, FragmentNotFoundError, isNotFoundError } from '../../errors.js';
import { atomicWriteText } from '../../fs-utils.js';

interface CachedFragment {
  tree: FragmentTree;
  dirty: boolean;
}

/**
 * Fragment store backed by JSON files.
 */
export class LocalFragmentStore implements FragmentStore {
  private readonly cache = new Map<string, CachedFragment>();

  async exists(file: string, path?: string): Promise<boolean> {
    const cached = await this.load(file);
    if (cached === null) return false;
    return path === undefined || cached.tree.exists(path);
  }

  async listGroups(file: string, path: string): Promise<string[]> {
    return (await this.open(file)).tree.listGroups(path);
  }

  async listDatasets(file: string, path: string): Promise<string[]> {
    return (await this.open(file)).tree.listDatasets(path);
  }

  async getType(file: string, path: string): Promise<DatasetType> {
    return (await this.open(file)).tree.dataset(path).dtype;
  }

  async getDimensions(file: string, path: string): Promise<number[]> {
    return [...(await this.open(file)).tree.dataset(path).shape];
  }

  async read(file: string, path: string): Promise<DatasetData> {
    const dataset = (await this.open(file)).tree.dataset(path);
    return { dtype: dataset.dtype, shape: [...dataset.shape], values: [...dataset.values] };
  }

  async create(file: string, path: string, data: DatasetData): Promise<void> {
    const cached = await this.openOrCreate(file);
    cached.tree.create(path, data);
    cached.dirty = true;
  }

  async preallocate(file: string, path: string, dtype: DatasetType, shape: number[]): Promise<void> {
    const cached = await this.openOrCreate(file);
    cached.tree.preallocate(path, dtype, shape);
    cached.dirty = true;
  }

  async write(file: string, path: string, values: DatasetValue[], offset: number): Promise<void> {
    const cached = await this.open(file);
    cached.tree.write(path, values, offset);
    cached.dirty = true;
  }

  async remove(file: string): Promise<void> {
    const key = resolve(file);
    this.cache.delete(key);
    await fs.rm(key, { force: true });
  }

  async flush(): Promise<void> {
    for (const [key, cached] of this.cache) {
      if (cached.dirty) {
        await atomicWriteText(key, JSON.stringify(cached.tree.toJson()));
        cached.dirty = false;
      }
    }
  }

  private async load(file: string): Promise<CachedFragment | null> {
    const key = resolve(file);
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    let text: string;
    try {
      text = await fs.readFile(key, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) {
        return null;
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new FragmentFormatError(file, err instanceof Error ? err.message : String(err));
    }

    const loaded: CachedFragment = { tree: FragmentTree.fromJson(file, raw), dirty: false };
    this.cache.set(key, loaded);
    return loaded;
  }

  private async open(file: string): Promise<CachedFragment> {
    const cached = await this.load(file);
    if (cached === null) {
      throw new FragmentNotFoundError(file);
    }
    return cached;
  }

  private async openOrCreate(file: string): Promise<CachedFragment> {
    const cached = await this.load(file);
    if (cached !== null) return cached;
    const created: CachedFragment = { tree: new FragmentTree(file), dirty: true };
    this.cache.set(resolve(file), created);
    return created;
  }
}
