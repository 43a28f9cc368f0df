/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * CLI utilities for argument parsing and store access
 */

import { dirname } from 'node:path';
import {
  LocalExperimentStore,
  StepPlannerRegistry,
  getConfigPath,
  loadConfig,
  loadPlannerModules,
  type CellflowConfig,
} from '@cellflow/core';

/**
 * Parse a positive integer argument.
 *
 * @throws {Error} If the value is not a positive integer
 */
export function parsePositiveInt(value: string, name: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return Number(value);
}

/**
 * Load the configuration and open the experiment store in its home directory.
 */
export function openExperimentStore(): { config: CellflowConfig; store: LocalExperimentStore } {
  const config = loadConfig();
  return { config, store: new LocalExperimentStore(config.home) };
}

/**
 * Load the planner modules named in the configuration.
 */
export async function openStepPlannerRegistry(config: CellflowConfig): Promise<StepPlannerRegistry> {
  const registry = new StepPlannerRegistry();
  await loadPlannerModules(registry, config.planners, dirname(getConfigPath()));
  return registry;
}

/**
 * Format error for CLI output.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Exit with error message.
 */
export function exitError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
