/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * In-memory group/dataset tree of a single fragment file.
 *
 * Shared by the local and in-memory fragment stores.
 */

import { z } from 'zod';
import { DATASET_TYPES } from '@cellflow/types';
import type { DatasetData, DatasetType, DatasetValue } from '@cellflow/types';
import { FragmentFormatError, FragmentNotFoundError } from '../errors.js';

/** A group: named subgroups and datasets */
export interface GroupNode {
  groups: Record<string, GroupNode>;
  datasets: Record<string, DatasetData>;
}

const DatasetSchema = z.object({
  dtype: z.enum(['int', 'float', 'bool', 'string']),
  shape: z.array(z.number().int().nonnegative()),
  values: z.array(z.union([z.number(), z.boolean(), z.string()])),
});

const GroupSchema: z.ZodType<GroupNode> = z.lazy(() =>
  z.object({
    groups: z.record(z.string(), GroupSchema),
    datasets: z.record(z.string(), DatasetSchema),
  })
);

/** On-disk document of a fragment file */
export const FragmentDocumentSchema = z.object({
  format: z.literal('cellflow-fragment'),
  version: z.literal(1),
  root: GroupSchema,
});

export type FragmentDocument = z.infer<typeof FragmentDocumentSchema>;

/** Split a `/`-separated path into its segments */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/** Join path segments into an absolute path */
export function joinPath(...segments: string[]): string {
  return '/' + segments.flatMap(splitPath).join('/');
}

function emptyGroup(): GroupNode {
  return { groups: {}, datasets: {} };
}

function defaultValue(dtype: DatasetType): DatasetValue {
  switch (dtype) {
    case 'int':
    case 'float':
      return 0;
    case 'bool':
      return false;
    case 'string':
      return '';
  }
}

function matchesType(value: DatasetValue, dtype: DatasetType): boolean {
  switch (dtype) {
    case 'int':
      return Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'bool':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
  }
}

function elementCount(shape: number[]): number {
  return shape.reduce((n, d) => n * d, 1);
}

/**
 * Group/dataset tree of one fragment file.
 */
export class FragmentTree {
  constructor(
    readonly file: string,
    readonly root: GroupNode = emptyGroup()
  ) {}

  /**
   * Parse a fragment document.
   *
   * @throws {FragmentFormatError} If the document is malformed
   */
  static fromJson(file: string, raw: unknown): FragmentTree {
    const result = FragmentDocumentSchema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new FragmentFormatError(file, reason);
    }
    const tree = new FragmentTree(file, result.data.root);
    tree.validate(tree.root, '');
    return tree;
  }

  toJson(): FragmentDocument {
    return { format: 'cellflow-fragment', version: 1, root: this.root };
  }

  exists(path: string): boolean {
    return this.findGroup(path) !== undefined || this.findDataset(path) !== undefined;
  }

  listGroups(path: string): string[] {
    return Object.keys(this.group(path).groups);
  }

  listDatasets(path: string): string[] {
    return Object.keys(this.group(path).datasets);
  }

  /** @throws {FragmentNotFoundError} If the dataset does not exist */
  dataset(path: string): DatasetData {
    const dataset = this.findDataset(path);
    if (dataset === undefined) {
      throw new FragmentNotFoundError(this.file, path);
    }
    return dataset;
  }

  /** @throws {FragmentFormatError} If the values do not match dtype and shape */
  create(path: string, data: DatasetData): void {
    this.checkValues(path, data.dtype, data.values);
    if (data.values.length !== elementCount(data.shape)) {
      throw new FragmentFormatError(
        this.file,
        `'${path}' has ${data.values.length} values for shape [${data.shape.join(', ')}]`
      );
    }
    const { parent, name } = this.parentOf(path);
    parent.datasets[name] = { dtype: data.dtype, shape: [...data.shape], values: [...data.values] };
  }

  preallocate(path: string, dtype: DatasetType, shape: number[]): void {
    const fill = defaultValue(dtype);
    const values = Array.from({ length: elementCount(shape) }, () => fill);
    this.create(path, { dtype, shape, values });
  }

  /**
   * Write rows starting at row `offset`; `values` holds whole rows.
   *
   * @throws {FragmentFormatError} If the rows do not fit the dataset
   */
  write(path: string, values: DatasetValue[], offset: number): void {
    const dataset = this.dataset(path);
    this.checkValues(path, dataset.dtype, values);

    const rowSize = elementCount(dataset.shape.slice(1));
    const rows = dataset.shape[0] ?? 0;
    if (rowSize === 0 || values.length % rowSize !== 0) {
      throw new FragmentFormatError(this.file, `'${path}': ${values.length} values do not form whole rows`);
    }
    const count = values.length / rowSize;
    if (!Number.isInteger(offset) || offset < 0 || offset + count > rows) {
      throw new FragmentFormatError(
        this.file,
        `'${path}': rows ${offset}..${offset + count} are out of bounds for ${rows} rows`
      );
    }
    const start = offset * rowSize;
    for (let i = 0; i < values.length; i++) {
      dataset.values[start + i] = values[i];
    }
  }

  private findGroup(path: string): GroupNode | undefined {
    let node: GroupNode | undefined = this.root;
    for (const segment of splitPath(path)) {
      node = node.groups[segment];
      if (node === undefined) return undefined;
    }
    return node;
  }

  private findDataset(path: string): DatasetData | undefined {
    const segments = splitPath(path);
    const name = segments.pop();
    if (name === undefined) return undefined;
    return this.findGroup(segments.join('/'))?.datasets[name];
  }

  private group(path: string): GroupNode {
    const group = this.findGroup(path);
    if (group === undefined) {
      throw new FragmentNotFoundError(this.file, path);
    }
    return group;
  }

  /** Parent group of a dataset path, created as needed */
  private parentOf(path: string): { parent: GroupNode; name: string } {
    const segments = splitPath(path);
    const name = segments.pop();
    if (name === undefined) {
      throw new FragmentFormatError(this.file, 'dataset path must not be empty');
    }
    let parent = this.root;
    for (const segment of segments) {
      if (segment in parent.datasets) {
        throw new FragmentFormatError(this.file, `'${segment}' is a dataset, not a group`);
      }
      parent.groups[segment] ??= emptyGroup();
      parent = parent.groups[segment];
    }
    if (name in parent.groups) {
      throw new FragmentFormatError(this.file, `'${path}' is a group, not a dataset`);
    }
    return { parent, name };
  }

  private checkValues(path: string, dtype: DatasetType, values: DatasetValue[]): void {
    if (!DATASET_TYPES.includes(dtype)) {
      throw new FragmentFormatError(this.file, `'${path}' has unknown type '${dtype}'`);
    }
    const bad = values.find((v) => !matchesType(v, dtype));
    if (bad !== undefined) {
      throw new FragmentFormatError(this.file, `'${path}': ${JSON.stringify(bad)} is not of type ${dtype}`);
    }
  }

  private validate(group: GroupNode, prefix: string): void {
    for (const [name, dataset] of Object.entries(group.datasets)) {
      const path = `${prefix}/${name}`;
      this.checkValues(path, dataset.dtype, dataset.values);
      if (dataset.values.length !== elementCount(dataset.shape)) {
        throw new FragmentFormatError(this.file, `'${path}' does not match its shape`);
      }
    }
    for (const [name, child] of Object.entries(group.groups)) {
      this.validate(child, `${prefix}/${name}`);
    }
  }
}
