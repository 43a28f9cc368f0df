/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Path conversion for batches.
 *
 * Batches hold absolute paths in memory and root-relative paths on disk, so
 * job description files stay valid when an experiment directory moves.
 * Every conversion recurses over the shape used by each key.
 */

import * as path from 'node:path';
import type {
  PathCollection,
  PathMap,
  PathShape,
  RunBatch,
  CollectBatch,
  JobDescriptions,
} from '@cellflow/types';
import { PathShapeError } from '../errors.js';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A path collection tagged with its shape */
export type ClassifiedPaths =
  | { shape: 'flat'; paths: string[] }
  | { shape: 'nested'; paths: string[][] }
  | { shape: 'mapping'; paths: Record<string, string[]> };

/**
 * Classify a path collection by shape.
 *
 * An empty list counts as flat.
 *
 * @param key - Key the value is stored under (for error messages)
 * @param value - Candidate path collection
 * @throws {PathShapeError} If the value is none of the three shapes
 */
export function classifyPaths(key: string, value: unknown): ClassifiedPaths {
  if (Array.isArray(value)) {
    if (isStringArray(value)) return { shape: 'flat', paths: value };
    const lists = value.filter(isStringArray);
    if (lists.length === value.length) return { shape: 'nested', paths: lists };
    throw new PathShapeError(key, 'list elements must all be paths or all be path lists');
  }
  if (isRecord(value)) {
    const paths: Record<string, string[]> = {};
    for (const [k, v] of Object.entries(value)) {
      if (!isStringArray(v)) {
        throw new PathShapeError(`${key}.${k}`, 'mapping values must be path lists');
      }
      paths[k] = v;
    }
    return { shape: 'mapping', paths };
  }
  throw new PathShapeError(key, `got ${value === null ? 'null' : typeof value}`);
}

export function pathShape(key: string, value: unknown): PathShape {
  return classifyPaths(key, value).shape;
}

/**
 * Apply a function to every path in a collection, preserving its shape.
 */
export function mapPaths(key: string, value: unknown, fn: (p: string) => string): PathCollection {
  const classified = classifyPaths(key, value);
  switch (classified.shape) {
    case 'flat':
      return classified.paths.map(fn);
    case 'nested':
      return classified.paths.map((paths) => paths.map(fn));
    case 'mapping': {
      const out: Record<string, string[]> = {};
      for (const [k, paths] of Object.entries(classified.paths)) {
        out[k] = paths.map(fn);
      }
      return out;
    }
  }
}

/**
 * All paths of a collection, flattened in order.
 */
export function flattenPaths(key: string, value: unknown): string[] {
  const classified = classifyPaths(key, value);
  switch (classified.shape) {
    case 'flat':
      return [...classified.paths];
    case 'nested':
      return classified.paths.flat();
    case 'mapping':
      return Object.values(classified.paths).flat();
  }
}

function mapPathMap(name: string, map: unknown, fn: (p: string) => string): PathMap {
  if (!isRecord(map)) {
    throw new PathShapeError(name, 'must be a mapping of keys to path collections');
  }
  const out: PathMap = {};
  for (const [key, value] of Object.entries(map)) {
    out[key] = mapPaths(`${name}.${key}`, value, fn);
  }
  return out;
}

/**
 * Validate an untyped mapping of path collections.
 *
 * @param name - Name of the mapping (for error messages)
 * @throws {PathShapeError} If the mapping or any of its values is malformed
 */
export function toPathMap(name: string, map: unknown): PathMap {
  return mapPathMap(name, map, (p) => p);
}

/**
 * Check that every key of a batch's inputs and outputs has a valid shape.
 *
 * @throws {PathShapeError} On the first invalid value
 */
export function validateBatchPaths(batch: RunBatch | CollectBatch): void {
  mapPathMap('inputs', batch.inputs, (p) => p);
  mapPathMap('outputs', batch.outputs, (p) => p);
}

function mapBatch<T extends RunBatch | CollectBatch>(batch: T, fn: (p: string) => string): T {
  return {
    ...batch,
    inputs: mapPathMap('inputs', batch.inputs, fn),
    outputs: mapPathMap('outputs', batch.outputs, fn),
  };
}

/**
 * Make all paths of a batch relative to the experiment root.
 *
 * @throws {PathShapeError} If a value is none of the three shapes
 */
export function toRelative<T extends RunBatch | CollectBatch>(batch: T, root: string): T {
  return mapBatch(batch, (p) => path.relative(root, p));
}

/**
 * Make all paths of a batch absolute by joining them onto the experiment root.
 *
 * `toAbsolute(toRelative(b, root), root)` equals `b` for every batch whose
 * paths are normalized and located under `root`.
 *
 * @throws {PathShapeError} If a value is none of the three shapes
 */
export function toAbsolute<T extends RunBatch | CollectBatch>(batch: T, root: string): T {
  return mapBatch(batch, (p) => path.join(root, p));
}

function collectFiles(maps: PathMap[], name: string): string[] {
  const files: string[] = [];
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      files.push(...flattenPaths(`${name}.${key}`, value));
    }
  }
  return files;
}

/**
 * All input files required by the run phase of a step.
 */
export function listInputFiles(descriptions: JobDescriptions): string[] {
  return collectFiles(descriptions.run.map((b) => b.inputs), 'inputs');
}

/**
 * All output files produced by a step, run phase first.
 */
export function listOutputFiles(descriptions: JobDescriptions): string[] {
  const maps = descriptions.run.map((b) => b.outputs);
  if (descriptions.collect) {
    maps.push(descriptions.collect.outputs);
  }
  return collectFiles(maps, 'outputs');
}
