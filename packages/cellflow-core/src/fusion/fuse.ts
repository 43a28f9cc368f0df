/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Fusion of per-job dataset fragments.
 *
 * Every run job writes one fragment holding the metadata of its site and the
 * rows of the objects it found. Fusion concatenates them into one dataset
 * per path: metadata gets one row per fragment, object datasets get the rows
 * of all fragments at non-overlapping, increasing offsets per category.
 */

import type { DatasetData, DatasetInfo, DatasetValue, FusionSummary } from '@cellflow/types';
import { FusionDataIncompleteError, FusionShapeError } from '../errors.js';
import type { FragmentStore } from '../storage/interfaces.js';
import { joinPath } from '../storage/fragment-tree.js';

const METADATA = '/metadata';
const OBJECTS = '/objects';

/**
 * Datasets of the fused output, as discovered in the first fragment.
 */
export interface FusionLayout {
  metadata: DatasetInfo[];
  /** Per category: features and segmentation datasets */
  categories: Map<string, { features: DatasetInfo[]; segmentation: DatasetInfo[] }>;
}

/**
 * Options for fusing fragments.
 */
export interface FuseOptions {
  /** Delete each fragment once its contents are copied (default: false) */
  deleteInputs?: boolean;
  /** Called after each fragment is copied */
  onFragment?: (file: string, index: number) => void;
}

async function listDatasetInfo(store: FragmentStore, file: string, group: string): Promise<DatasetInfo[]> {
  const infos: DatasetInfo[] = [];
  for (const name of await store.listDatasets(file, group)) {
    const path = joinPath(group, name);
    infos.push({ path, dtype: await store.getType(file, path) });
  }
  return infos;
}

async function listGroupsIfExists(store: FragmentStore, file: string, group: string): Promise<string[]> {
  return (await store.exists(file, group)) ? store.listGroups(file, group) : [];
}

async function listDatasetsIfExists(store: FragmentStore, file: string, group: string): Promise<string[]> {
  return (await store.exists(file, group)) ? store.listDatasets(file, group) : [];
}

/**
 * Discover the datasets of a fragment.
 *
 * Segmentation datasets include those of one level of nested groups.
 */
export async function discoverLayout(store: FragmentStore, file: string): Promise<FusionLayout> {
  const metadata = (await store.exists(file, METADATA))
    ? await listDatasetInfo(store, file, METADATA)
    : [];

  const categories: FusionLayout['categories'] = new Map();
  for (const category of await listGroupsIfExists(store, file, OBJECTS)) {
    const featuresPath = joinPath(OBJECTS, category, 'features');
    const segmentationPath = joinPath(OBJECTS, category, 'segmentation');

    const features = (await store.exists(file, featuresPath))
      ? await listDatasetInfo(store, file, featuresPath)
      : [];

    const segmentation: DatasetInfo[] = [];
    if (await store.exists(file, segmentationPath)) {
      segmentation.push(...(await listDatasetInfo(store, file, segmentationPath)));
      for (const group of await store.listGroups(file, segmentationPath)) {
        segmentation.push(...(await listDatasetInfo(store, file, joinPath(segmentationPath, group))));
      }
    }

    categories.set(category, { features, segmentation });
  }

  return { metadata, categories };
}

/**
 * Number of object rows of a category in a fragment.
 *
 * Taken from the first features dataset, else from `segmentation/object_ids`.
 *
 * @throws {FusionDataIncompleteError} If neither exists
 */
async function countRows(
  store: FragmentStore,
  file: string,
  category: string,
  layout: FusionLayout
): Promise<number> {
  const firstFeature = layout.categories.get(category)?.features[0];
  const objectIds = joinPath(OBJECTS, category, 'segmentation', 'object_ids');

  let sizing: string;
  if (firstFeature && (await store.exists(file, firstFeature.path))) {
    sizing = firstFeature.path;
  } else if (await store.exists(file, objectIds)) {
    sizing = objectIds;
  } else {
    throw new FusionDataIncompleteError(file, category);
  }

  const dims = await store.getDimensions(file, sizing);
  return dims[0] ?? 0;
}

async function readColumn(store: FragmentStore, file: string, path: string): Promise<DatasetData> {
  const data = await store.read(file, path);
  if (data.shape.length > 1) {
    throw new FusionShapeError(path, `dataset must be one-dimensional, got shape [${data.shape.join(', ')}]`);
  }
  return data;
}

/**
 * Fuse dataset fragments into a single output file.
 *
 * The first fragment determines which datasets exist. Fragments are copied
 * in the given order; rows of fragment `i` of a category start where those
 * of fragment `i - 1` end.
 *
 * @param store - Store holding fragments and output
 * @param fragments - Fragment files in job order
 * @param output - Output file (datasets are replaced)
 * @throws {FusionDataIncompleteError} If a category has neither features nor object ids
 * @throws {FusionShapeError} If a dataset is multi-dimensional or its row count
 *   does not match the fragment
 */
export async function fuseDatasets(
  store: FragmentStore,
  fragments: readonly string[],
  output: string,
  options: FuseOptions = {}
): Promise<FusionSummary> {
  const first = fragments[0];
  if (first === undefined) {
    return { fragments: 0, rows: {} };
  }

  const layout = await discoverLayout(store, first);
  const categories = [...layout.categories.keys()];

  // Sizing
  const fragmentRows: Map<string, number>[] = [];
  const totals = new Map<string, number>(categories.map((c) => [c, 0]));
  for (const file of fragments) {
    const rows = new Map<string, number>();
    for (const category of categories) {
      const n = await countRows(store, file, category, layout);
      rows.set(category, n);
      totals.set(category, (totals.get(category) ?? 0) + n);
    }
    fragmentRows.push(rows);
  }

  // Preallocation into a fresh output file
  await store.remove(output);
  for (const info of layout.metadata) {
    await store.preallocate(output, info.path, info.dtype, [fragments.length]);
  }
  for (const [category, { features, segmentation }] of layout.categories) {
    const total = totals.get(category) ?? 0;
    for (const info of [...segmentation, ...features]) {
      await store.preallocate(output, info.path, info.dtype, [total]);
    }
  }

  // Copy
  const cursors = new Map<string, number>(categories.map((c) => [c, 0]));
  for (const [index, file] of fragments.entries()) {
    for (const name of await listDatasetsIfExists(store, file, METADATA)) {
      const path = joinPath(METADATA, name);
      const data = await readColumn(store, file, path);
      if (data.values.length !== 1) {
        throw new FusionShapeError(path, `expected one value per fragment, got ${data.values.length} in '${file}'`);
      }
      await writeRows(store, output, path, data.values, index);
    }

    for (const category of categories) {
      const offset = cursors.get(category) ?? 0;
      const rows = fragmentRows[index]?.get(category) ?? 0;

      const paths: string[] = [];
      const featuresPath = joinPath(OBJECTS, category, 'features');
      const segmentationPath = joinPath(OBJECTS, category, 'segmentation');
      for (const name of await listDatasetsIfExists(store, file, featuresPath)) {
        paths.push(joinPath(featuresPath, name));
      }
      for (const name of await listDatasetsIfExists(store, file, segmentationPath)) {
        paths.push(joinPath(segmentationPath, name));
      }
      for (const group of await listGroupsIfExists(store, file, segmentationPath)) {
        for (const name of await store.listDatasets(file, joinPath(segmentationPath, group))) {
          paths.push(joinPath(segmentationPath, group, name));
        }
      }

      for (const path of paths) {
        const data = await readColumn(store, file, path);
        if (data.values.length !== rows) {
          throw new FusionShapeError(path, `expected ${rows} rows in '${file}', got ${data.values.length}`);
        }
        await writeRows(store, output, path, data.values, offset);
      }

      cursors.set(category, offset + rows);
    }

    if (options.deleteInputs) {
      await store.flush();
      await store.remove(file);
    }
    options.onFragment?.(file, index);
  }

  await store.flush();
  return { fragments: fragments.length, rows: Object.fromEntries(totals) };
}

async function writeRows(
  store: FragmentStore,
  output: string,
  path: string,
  values: DatasetValue[],
  offset: number
): Promise<void> {
  if (!(await store.exists(output, path))) {
    throw new FusionShapeError(path, 'dataset does not exist in the first fragment');
  }
  await store.write(output, path, values, offset);
}

/** Groups that are always recreated and never carried over */
const SKIPPED_GROUP = /objects\/[^/]+\/map_data(\/|$)/;
/** Datasets that are always recreated and never carried over (`ids`, `ids_*`, ...) */
const SKIPPED_DATASET = /objects\/[^/]+\/ids/;

/**
 * Copy every dataset of an old file into a new file unless the new file
 * already has it.
 *
 * Object map data groups and object id datasets are skipped.
 *
 * @returns Paths of the copied datasets
 */
export async function mergeDatasets(
  store: FragmentStore,
  oldFile: string,
  newFile: string
): Promise<string[]> {
  const copied: string[] = [];

  const copyGroup = async (group: string): Promise<void> => {
    for (const name of await store.listDatasets(oldFile, group)) {
      const path = joinPath(group, name);
      if (SKIPPED_DATASET.test(path)) continue;
      if (await store.exists(newFile, path)) continue;
      await store.create(newFile, path, await store.read(oldFile, path));
      copied.push(path);
    }
    for (const name of await store.listGroups(oldFile, group)) {
      const path = joinPath(group, name);
      if (SKIPPED_GROUP.test(path)) continue;
      await copyGroup(path);
    }
  };

  await copyGroup('/');
  await store.flush();
  return copied;
}
