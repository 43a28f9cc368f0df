/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DuplicateJobError, JobNotSubmittedError } from '../errors.js';
import { makeJob } from '../test-helpers.js';
import { MockExecutionEngine } from './MockExecutionEngine.js';

describe('MockExecutionEngine', () => {
  it('moves a job through its lifecycle', async () => {
    const engine = new MockExecutionEngine();
    const job = makeJob('a');
    await engine.submit(job);
    assert.strictEqual(engine.statusOf(job).state, 'created');

    await engine.progress();
    assert.strictEqual(engine.statusOf(job).state, 'running');

    await engine.progress();
    assert.deepStrictEqual(engine.statusOf(job), {
      state: 'terminated',
      exitCode: 0,
      elapsedTime: 1,
      cpuTime: 1,
      maxMemory: null,
    });
  });

  it('applies configured outcomes', async () => {
    const engine = new MockExecutionEngine();
    const failing = makeJob('failing');
    const killed = makeJob('killed');
    engine.setOutcome('failing', { exitCode: 2, ticks: 2 });
    engine.setOutcome('killed', { stopped: true, exitCode: 137 });
    await engine.submit(failing);
    await engine.submit(killed);

    await engine.progress();
    await engine.progress();
    assert.strictEqual(engine.statusOf(failing).state, 'running');
    assert.strictEqual(engine.statusOf(killed).state, 'stopped');

    await engine.progress();
    assert.strictEqual(engine.statusOf(failing).state, 'terminated');
    assert.strictEqual(engine.statusOf(failing).exitCode, 2);
  });

  it('starts dependent jobs after their dependencies', async () => {
    const engine = new MockExecutionEngine();
    const run = makeJob('run');
    const collect = makeJob('collect', { phase: 'collect' });
    await engine.submit(run);
    await engine.submit(collect, [run]);

    await engine.progress();
    assert.strictEqual(engine.statusOf(collect).state, 'submitted');
    await engine.progress();
    assert.strictEqual(engine.statusOf(collect).state, 'running');
    assert.deepStrictEqual(engine.getSubmitted(), [
      { name: 'run', dependsOn: [] },
      { name: 'collect', dependsOn: ['run'] },
    ]);
  });

  it('stops dependent jobs when a dependency failed', async () => {
    const engine = new MockExecutionEngine();
    const run = makeJob('run');
    const collect = makeJob('collect', { phase: 'collect' });
    engine.setOutcome('run', { exitCode: 1 });
    await engine.submit(run);
    await engine.submit(collect, [run]);

    await engine.progress();
    await engine.progress();
    assert.strictEqual(engine.statusOf(collect).state, 'stopped');
    assert.strictEqual(engine.statusOf(collect).exitCode, null);
  });

  it('respects the in-flight limit', async () => {
    const engine = new MockExecutionEngine();
    engine.configure({ maxSubmitted: 10, maxInFlight: 2 });
    const jobs = ['a', 'b', 'c', 'd', 'e'].map((name) => makeJob(name));
    for (const job of jobs) {
      await engine.submit(job);
    }

    await engine.progress();
    assert.deepStrictEqual(
      jobs.map((j) => engine.statusOf(j).state),
      ['running', 'running', 'submitted', 'submitted', 'submitted']
    );
    for (let i = 0; i < 2; i++) {
      await engine.progress();
    }
    assert.deepStrictEqual(
      jobs.map((j) => engine.statusOf(j).state),
      ['terminated', 'terminated', 'terminated', 'terminated', 'running']
    );
    assert.strictEqual(engine.peakRunning, 2);
  });

  it('rejects duplicate and unknown jobs', async () => {
    const engine = new MockExecutionEngine();
    await engine.submit(makeJob('a'));
    await assert.rejects(engine.submit(makeJob('a')), DuplicateJobError);
    await assert.rejects(engine.submit(makeJob('b'), [makeJob('c')]), JobNotSubmittedError);
    assert.throws(() => engine.statusOf(makeJob('c')), JobNotSubmittedError);
  });

  it('fails the next progress call on request', async () => {
    const engine = new MockExecutionEngine();
    engine.failNextProgress(new Error('backend unavailable'));
    await assert.rejects(engine.progress(), /backend unavailable/);
    await engine.progress();
    assert.strictEqual(engine.progressCalls, 2);
  });
});
