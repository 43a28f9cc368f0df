/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { JobDescriptions } from '@cellflow/types';
import {
  CellflowError,
  DuplicateStepPlannerError,
  PlannerPluginError,
  UnknownStepError,
  UnknownStepPlannerError,
} from '../errors.js';
import { createTempDir, removeTempDir } from '../test-helpers.js';
import { BatchPlanner, type BatchPlannerOptions } from './planner.js';
import { StepPlannerRegistry, loadPlannerModules } from './step-planners.js';

class IlluminationPlanner extends BatchPlanner<{ channels: string[] }> {
  readonly step = 'corilla';
  protected readonly argsSchema = z.object({ channels: z.array(z.string()) });

  protected createBatches(args: { channels: string[] }): JobDescriptions {
    return {
      run: args.channels.map((channel, i) => ({
        id: i + 1,
        inputs: { images: [join(this.root, channel)] },
        outputs: {},
      })),
    };
  }

  async runJob(): Promise<void> {}

  async collectJobOutput(): Promise<void> {}
}

const options: BatchPlannerOptions = { experimentId: 3, root: '/data/plate1' };

describe('StepPlannerRegistry', () => {
  it('creates the planner registered for a step', () => {
    const registry = new StepPlannerRegistry();
    registry.register('corilla', (o) => new IlluminationPlanner(o));

    const planner = registry.create('corilla', options);

    assert.ok(planner instanceof IlluminationPlanner);
    assert.strictEqual(planner.experimentId, 3);
    assert.strictEqual(planner.root, '/data/plate1');
    assert.deepStrictEqual(registry.steps, ['corilla']);
    assert.strictEqual(registry.has('corilla'), true);
    assert.strictEqual(registry.has('align'), false);
  });

  it('rejects steps outside the registry', () => {
    const registry = new StepPlannerRegistry();
    assert.throws(() => registry.register('segment', (o) => new IlluminationPlanner(o)), UnknownStepError);
    assert.throws(() => registry.create('segment', options), UnknownStepError);
  });

  it('rejects a second planner for a step', () => {
    const registry = new StepPlannerRegistry();
    registry.register('corilla', (o) => new IlluminationPlanner(o));
    assert.throws(
      () => registry.register('corilla', (o) => new IlluminationPlanner(o)),
      DuplicateStepPlannerError
    );
  });

  it('fails for steps without a planner', () => {
    const registry = new StepPlannerRegistry();
    registry.register('corilla', (o) => new IlluminationPlanner(o));
    assert.throws(
      () => registry.create('jterator', options),
      (err: unknown) =>
        err instanceof UnknownStepPlannerError &&
        err.step === 'jterator' &&
        err.message === "No planner is registered for step 'jterator'. Registered steps: corilla"
    );
  });

  it('rejects planners of another step', () => {
    const registry = new StepPlannerRegistry();
    registry.register('align', (o) => new IlluminationPlanner(o));
    assert.throws(
      () => registry.create('align', options),
      (err: unknown) =>
        err instanceof CellflowError &&
        err.message === "Planner registered for step 'align' plans step 'corilla'"
    );
  });
});

describe('loadPlannerModules', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('lets each module register its planners', async () => {
    writeFileSync(
      join(dir, 'planners.mjs'),
      "export function register(registry) {\n" +
      "  registry.register('corilla', () => { throw new Error('not created in this test'); });\n" +
      "  registry.register('align', () => { throw new Error('not created in this test'); });\n" +
      "}\n"
    );
    const registry = new StepPlannerRegistry();

    await loadPlannerModules(registry, ['./planners.mjs'], dir);

    assert.deepStrictEqual(registry.steps, ['corilla', 'align']);
  });

  it('rejects modules without a register function', async () => {
    writeFileSync(join(dir, 'empty.mjs'), 'export const planners = [];\n');
    await assert.rejects(
      loadPlannerModules(new StepPlannerRegistry(), [join(dir, 'empty.mjs')]),
      (err: unknown) =>
        err instanceof PlannerPluginError &&
        err.reason === 'module does not export a register function'
    );
  });

  it('fails for modules that cannot be imported', async () => {
    await assert.rejects(
      loadPlannerModules(new StepPlannerRegistry(), ['./missing.mjs'], dir),
      (err: unknown) => err instanceof PlannerPluginError && err.specifier === './missing.mjs'
    );
  });
});
