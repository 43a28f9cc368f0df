/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow fuse and merge commands - Combine dataset fragments
 *
 * Usage:
 *   cellflow fuse fused.json data_1.json data_2.json --delete
 *   cellflow merge previous.json fused.json
 */

import { LocalFragmentStore, fuseDatasets, mergeDatasets } from '@cellflow/core';
import { exitError, formatError } from '../utils.js';

/**
 * Fuse fragments into one output file.
 */
export async function fuseCommand(output: string, fragments: string[], options: { delete?: boolean }): Promise<void> {
  try {
    const store = new LocalFragmentStore();
    const summary = await fuseDatasets(store, fragments, output, {
      deleteInputs: options.delete ?? false,
      onFragment: (file, index) => console.log(`  [${index + 1}/${fragments.length}] ${file}`),
    });

    console.log('');
    console.log(`Fused ${summary.fragments} fragment(s) into ${output}`);
    for (const [category, rows] of Object.entries(summary.rows)) {
      console.log(`  ${category}: ${rows} row(s)`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}

/**
 * Copy the datasets of an older output that a new output lacks.
 */
export async function mergeCommand(oldFile: string, newFile: string): Promise<void> {
  try {
    const copied = await mergeDatasets(new LocalFragmentStore(), oldFile, newFile);
    if (copied.length === 0) {
      console.log('Nothing to merge');
      return;
    }
    console.log(`Copied ${copied.length} dataset(s) into ${newFile}:`);
    for (const path of copied) {
      console.log(`  ${path}`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
