/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow experiment commands - Experiment registration
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { exitError, formatError, openExperimentStore } from '../utils.js';

export const experimentCommand = {
  /**
   * Register an experiment root directory.
   */
  async create(name: string, rootArg: string): Promise<void> {
    try {
      const root = resolve(rootArg);
      if (!existsSync(root)) {
        exitError(`Experiment root does not exist: ${root}`);
      }
      const { store } = openExperimentStore();
      const experiment = await store.createExperiment(name, root);

      console.log(`Created experiment ${experiment.id}: ${experiment.name}`);
      console.log(`Root: ${experiment.root}`);
    } catch (err) {
      exitError(formatError(err));
    }
  },

  /**
   * List registered experiments.
   */
  async list(): Promise<void> {
    try {
      const { store } = openExperimentStore();
      const experiments = await store.listExperiments();

      if (experiments.length === 0) {
        console.log('No experiments');
        return;
      }

      for (const experiment of experiments) {
        console.log(`  ${experiment.id}  ${experiment.name}  ${experiment.root}  (${experiment.createdAt})`);
      }
    } catch (err) {
      exitError(formatError(err));
    }
  },
};
