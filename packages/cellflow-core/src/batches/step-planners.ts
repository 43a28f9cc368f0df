/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Step planner registry.
 *
 * Steps are implemented outside of cellflow. A planner module registers its
 * planners by exporting a `register` function:
 *
 * ```typescript
 * import type { StepPlannerRegistry } from '@cellflow/core';
 *
 * export function register(registry: StepPlannerRegistry): void {
 *   registry.register('jterator', (options) => new JteratorPlanner(options));
 * }
 * ```
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { StepName } from '@cellflow/types';
import {
  CellflowError,
  DuplicateStepPlannerError,
  PlannerPluginError,
  UnknownStepPlannerError,
} from '../errors.js';
import { validateStep } from '../workflow/registry.js';
import type { BatchPlanner, BatchPlannerOptions } from './planner.js';

/** Creates the planner of a step for one experiment */
export type StepPlannerFactory = (options: BatchPlannerOptions) => BatchPlanner<unknown>;

/**
 * Maps step names to planner factories.
 */
export class StepPlannerRegistry {
  private readonly factories = new Map<StepName, StepPlannerFactory>();

  /** Steps with a registered planner, in registration order */
  get steps(): StepName[] {
    return [...this.factories.keys()];
  }

  /**
   * @throws {UnknownStepError} If the step is not part of any stage
   * @throws {DuplicateStepPlannerError} If the step already has a planner
   */
  register(step: string, factory: StepPlannerFactory): void {
    const name = validateStep(step);
    if (this.factories.has(name)) {
      throw new DuplicateStepPlannerError(name);
    }
    this.factories.set(name, factory);
  }

  has(step: string): boolean {
    return this.factories.has(validateStep(step));
  }

  /**
   * Create the planner of a step.
   *
   * @throws {UnknownStepError} If the step is not part of any stage
   * @throws {UnknownStepPlannerError} If no planner is registered for the step
   */
  create(step: string, options: BatchPlannerOptions): BatchPlanner<unknown> {
    const name = validateStep(step);
    const factory = this.factories.get(name);
    if (factory === undefined) {
      throw new UnknownStepPlannerError(name, this.steps);
    }
    const planner = factory(options);
    if (planner.step !== name) {
      throw new CellflowError(`Planner registered for step '${name}' plans step '${planner.step}'`);
    }
    return planner;
  }
}

/**
 * Import planner modules and let each register its planners.
 *
 * Relative specifiers are resolved against `baseDir`; all others are
 * imported as they are.
 *
 * @throws {PlannerPluginError} If a module cannot be imported or has no `register` export
 */
export async function loadPlannerModules(
  registry: StepPlannerRegistry,
  specifiers: readonly string[],
  baseDir: string = process.cwd()
): Promise<void> {
  for (const specifier of specifiers) {
    const target = specifier.startsWith('.') || isAbsolute(specifier)
      ? pathToFileURL(resolve(baseDir, specifier)).href
      : specifier;

    let mod: unknown;
    try {
      mod = await import(target);
    } catch (err) {
      throw new PlannerPluginError(specifier, err instanceof Error ? err.message : String(err));
    }

    if (typeof mod !== 'object' || mod === null || !('register' in mod) || typeof mod.register !== 'function') {
      throw new PlannerPluginError(specifier, 'module does not export a register function');
    }
    await mod.register(registry);
  }
}
