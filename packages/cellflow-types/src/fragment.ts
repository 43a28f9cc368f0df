/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Fragment dataset types.
 *
 * A fragment is the hierarchical data file written by one run job. Groups
 * nest like directories; datasets are typed, row-major arrays.
 *
 * Layout of an image analysis fragment:
 *
 * ```
 * /metadata/<name>                            one value per job
 * /objects/<category>/features/<name>         one row per object
 * /objects/<category>/segmentation/<name>     one row per object
 * /objects/<category>/segmentation/<group>/<name>
 * ```
 */

/** Element type of a dataset */
export type DatasetType = 'int' | 'float' | 'bool' | 'string';

export const DATASET_TYPES: readonly DatasetType[] = ['int', 'float', 'bool', 'string'];

/** A single element of a dataset */
export type DatasetValue = number | boolean | string;

/**
 * Contents of a dataset.
 */
export interface DatasetData {
  dtype: DatasetType;
  /** Dimensions; one-dimensional datasets have a single entry */
  shape: number[];
  /** Elements in row-major order */
  values: DatasetValue[];
}

/**
 * A dataset to be created in the fused output.
 */
export interface DatasetInfo {
  /** Absolute dataset path, e.g. `/objects/cells/features/area` */
  path: string;
  dtype: DatasetType;
}

/**
 * Summary of a fusion pass.
 */
export interface FusionSummary {
  /** Number of fused fragments */
  fragments: number;
  /** Total rows per object category */
  rows: Record<string, number>;
}
