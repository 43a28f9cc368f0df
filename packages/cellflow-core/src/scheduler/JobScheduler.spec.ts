/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { Job, JobStatusRow } from '@cellflow/types';
import { MonitorAbortedError } from '../errors.js';
import { MockExecutionEngine } from '../execution/MockExecutionEngine.js';
import { Submission } from '../execution/Submission.js';
import { InMemoryExperimentStore } from '../storage/in-memory/InMemoryExperimentStore.js';
import { makeJob } from '../test-helpers.js';
import { JobScheduler, type ProgressReport } from './JobScheduler.js';

const noSleep = async (): Promise<void> => {};

function runJobs(count: number): Job[] {
  return Array.from({ length: count }, (_, i) =>
    makeJob(`jterator_run_00000${i + 1}`, { batchId: i + 1 })
  );
}

describe('JobScheduler', () => {
  it('reports exactly the failed jobs', async () => {
    const engine = new MockExecutionEngine();
    engine.setOutcome('jterator_run_000003', { exitCode: 1 });
    const failures: JobStatusRow[][] = [];
    const scheduler = new JobScheduler({ engine, sleep: noSleep, onFailure: (f) => failures.push(f) });

    const result = await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(5) }));

    assert.strictEqual(result.state, 'terminated');
    assert.deepStrictEqual(result.failed.map((r) => r.name), ['jterator_run_000003']);
    assert.strictEqual(result.rows.length, 5);
    assert.deepStrictEqual(failures, [result.failed]);
  });

  it('polls once more after the submission is done', async () => {
    const engine = new MockExecutionEngine();
    const reports: ProgressReport[] = [];
    const scheduler = new JobScheduler({ engine, sleep: noSleep, onProgress: (r) => reports.push(r) });

    await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(2) }));

    assert.deepStrictEqual(
      reports.map((r) => [r.iteration, r.state]),
      [
        [1, 'running'],
        [2, 'terminated'],
        [3, 'terminated'],
      ]
    );
    assert.strictEqual(engine.progressCalls, 4);
  });

  it('does not call onFailure when all jobs succeed', async () => {
    let called = false;
    const scheduler = new JobScheduler({
      engine: new MockExecutionEngine(),
      sleep: noSleep,
      onFailure: () => {
        called = true;
      },
    });
    const result = await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(3) }));
    assert.deepStrictEqual(result.failed, []);
    assert.strictEqual(called, false);
  });

  it('runs the collect job after all run jobs', async () => {
    const engine = new MockExecutionEngine();
    const reports: ProgressReport[] = [];
    const scheduler = new JobScheduler({ engine, sleep: noSleep, onProgress: (r) => reports.push(r) });
    const collect = makeJob('jterator_collect', { phase: 'collect' });

    const result = await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(2), collect }));

    assert.deepStrictEqual(engine.getSubmitted(), [
      { name: 'jterator_run_000001', dependsOn: [] },
      { name: 'jterator_run_000002', dependsOn: [] },
      { name: 'jterator_collect', dependsOn: ['jterator_run_000001', 'jterator_run_000002'] },
    ]);
    assert.deepStrictEqual(
      reports.map((r) => r.rows.map((row) => row.state)),
      [
        ['running', 'running', 'submitted'],
        ['terminated', 'terminated', 'running'],
        ['terminated', 'terminated', 'terminated'],
        ['terminated', 'terminated', 'terminated'],
      ]
    );
    assert.strictEqual(result.state, 'terminated');
  });

  it('stops the collect job when a run job failed', async () => {
    const engine = new MockExecutionEngine();
    engine.setOutcome('jterator_run_000002', { exitCode: 1 });
    const scheduler = new JobScheduler({ engine, sleep: noSleep });
    const collect = makeJob('jterator_collect', { phase: 'collect' });

    const result = await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(2), collect }));

    assert.strictEqual(result.state, 'stopped');
    assert.deepStrictEqual(
      result.failed.map((r) => [r.name, r.state, r.exitCode]),
      [
        ['jterator_run_000002', 'terminated', 1],
        ['jterator_collect', 'stopped', null],
      ]
    );
  });

  it('limits submitted and running jobs to the cap', async () => {
    const engine = new MockExecutionEngine();
    const scheduler = new JobScheduler({ engine, sleep: noSleep });

    await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(5) }), { cap: 3 });

    assert.deepStrictEqual(engine.configureCalls, [{ maxSubmitted: 3, maxInFlight: 3 }]);
    assert.strictEqual(engine.peakRunning, 3);
  });

  it('waits the monitoring interval between polls', async () => {
    const waits: number[] = [];
    const scheduler = new JobScheduler({
      engine: new MockExecutionEngine(),
      interval: 2,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    await scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(1) }));
    assert.deepStrictEqual(waits, [2000, 2000, 2000]);
  });

  it('saves the status rows to the store', async () => {
    const store = new InMemoryExperimentStore();
    const experiment = await store.createExperiment('plate1', '/data/plate1');
    const record = await store.createSubmissionRecord(experiment.id, 'jterator');
    const scheduler = new JobScheduler({ engine: new MockExecutionEngine(), store, sleep: noSleep });

    const result = await scheduler.submit(
      Submission.fromJobs(record.id, 'jterator', { run: runJobs(2) })
    );

    assert.deepStrictEqual(await store.listJobRecords(record.id), result.rows);
  });

  it('propagates engine errors', async () => {
    const engine = new MockExecutionEngine();
    engine.failNextProgress(new Error('backend unavailable'));
    const scheduler = new JobScheduler({ engine, sleep: noSleep });

    await assert.rejects(
      scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(1) })),
      /backend unavailable/
    );
  });

  it('stops monitoring with the last status when aborted', async () => {
    const controller = new AbortController();
    const scheduler = new JobScheduler({
      engine: new MockExecutionEngine(),
      sleep: noSleep,
      onProgress: () => controller.abort(),
    });

    await assert.rejects(
      scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(2) }), { signal: controller.signal }),
      (err: unknown) => {
        assert.ok(err instanceof MonitorAbortedError);
        assert.deepStrictEqual(
          err.lastStatus.map((r) => r.state),
          ['running', 'running']
        );
        return true;
      }
    );
  });

  it('interrupts the default wait when aborted', async () => {
    const controller = new AbortController();
    const scheduler = new JobScheduler({ engine: new MockExecutionEngine(), interval: 60 });
    setTimeout(() => controller.abort(), 10);

    await assert.rejects(
      scheduler.submit(Submission.fromJobs(1, 'jterator', { run: runJobs(1) }), { signal: controller.signal }),
      (err: unknown) => err instanceof MonitorAbortedError && err.lastStatus.length === 0
    );
  });
});
