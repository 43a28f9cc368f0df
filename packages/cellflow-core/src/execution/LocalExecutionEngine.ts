/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Local job execution.
 *
 * This module handles all local process-specific execution:
 * - Queueing jobs behind the submitted and in-flight limits
 * - Spawning job processes once their dependencies are terminal
 * - Capturing stdout/stderr into the job's log directory
 * - Sampling cpu time and peak memory while jobs run
 * - Enforcing the requested wall-time
 */

import { createWriteStream, promises as fs, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { spawn, type ChildProcess } from 'node:child_process';
import { once } from 'node:events';
import type { EngineJobStatus, Job, JobState } from '@cellflow/types';
import { isTerminal } from '@cellflow/types';
import { DuplicateJobError, JobNotSubmittedError } from '../errors.js';
import type { EngineLimits, ExecutionEngine } from './interfaces.js';
import { getCpuTime, getPeakMemory } from './processHelpers.js';

interface LocalJob {
  job: Job;
  dependsOn: string[];
  state: JobState;
  exitCode: number | null;
  startedAt: number | null;
  endedAt: number | null;
  cpuTime: number | null;
  maxMemory: number | null;
  child: ChildProcess | null;
  killedByWalltime: boolean;
  timeoutId: NodeJS.Timeout | undefined;
  done: Promise<void> | null;
}

/**
 * Options for the local engine.
 */
export interface LocalExecutionEngineOptions {
  /** Log file timestamp source (default: current time) */
  now?: () => Date;
}

/** Timestamp used in log file names, e.g. 20250102T030405123Z */
export function logTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

/**
 * ExecutionEngine implementation for local process execution.
 *
 * Each job runs `job.command` as a child process in its own process group.
 * stdout and stderr go to `<logDir>/<job>_<timestamp>.out` and `.err`.
 */
export class LocalExecutionEngine implements ExecutionEngine {
  private readonly jobs = new Map<string, LocalJob>();
  private limits: EngineLimits = { maxSubmitted: Infinity, maxInFlight: Infinity };
  private readonly now: () => Date;

  constructor(options: LocalExecutionEngineOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  configure(limits: EngineLimits): void {
    this.limits = { ...limits };
  }

  async submit(job: Job, dependsOn: readonly Job[] = []): Promise<void> {
    if (this.jobs.has(job.name)) {
      throw new DuplicateJobError(job.name);
    }
    for (const dependency of dependsOn) {
      this.entry(dependency.name);
    }
    await fs.mkdir(job.logDir, { recursive: true });
    this.jobs.set(job.name, {
      job,
      dependsOn: dependsOn.map((d) => d.name),
      state: 'created',
      exitCode: null,
      startedAt: null,
      endedAt: null,
      cpuTime: null,
      maxMemory: null,
      child: null,
      killedByWalltime: false,
      timeoutId: undefined,
      done: null,
    });
  }

  async progress(): Promise<void> {
    const entries = [...this.jobs.values()];

    // Hand queued jobs to the backend, up to maxSubmitted active jobs
    let active = entries.filter((e) => e.state === 'submitted' || e.state === 'running').length;
    for (const entry of entries) {
      if (active >= this.limits.maxSubmitted) break;
      if (entry.state === 'created') {
        entry.state = 'submitted';
        active++;
      }
    }

    // Start submitted jobs whose dependencies are terminal
    let running = entries.filter((e) => e.state === 'running').length;
    for (const entry of entries) {
      if (entry.state !== 'submitted') continue;
      const dependencies = entry.dependsOn.map((name) => this.entry(name));
      if (!dependencies.every((d) => isTerminal(d.state))) continue;

      if (dependencies.some((d) => d.state === 'stopped' || d.exitCode !== 0)) {
        entry.state = 'stopped';
        continue;
      }
      if (running >= this.limits.maxInFlight) continue;
      this.start(entry);
      running++;
    }

    // Sample resources of running jobs
    await Promise.all(
      entries
        .filter((e) => e.state === 'running' && e.child?.pid !== undefined)
        .map(async (e) => {
          const pid = e.child?.pid;
          if (pid === undefined) return;
          const [cpuTime, maxMemory] = await Promise.all([getCpuTime(pid), getPeakMemory(pid)]);
          if (cpuTime !== null) e.cpuTime = cpuTime;
          if (maxMemory !== null) e.maxMemory = Math.max(maxMemory, e.maxMemory ?? 0);
        })
    );
  }

  statusOf(job: Job): EngineJobStatus {
    const entry = this.entry(job.name);
    const end = entry.endedAt ?? Date.now();
    return {
      state: entry.state,
      exitCode: entry.exitCode,
      elapsedTime: entry.startedAt === null ? 0 : (end - entry.startedAt) / 1000,
      cpuTime: entry.cpuTime,
      maxMemory: entry.maxMemory,
    };
  }

  /**
   * Wait until every started job has exited and its logs are flushed.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((e) => e.done ?? Promise.resolve()));
  }

  private entry(name: string): LocalJob {
    const entry = this.jobs.get(name);
    if (entry === undefined) {
      throw new JobNotSubmittedError(name);
    }
    return entry;
  }

  private start(entry: LocalJob): void {
    const { job } = entry;
    const [cmd, ...args] = job.command;
    const base = join(job.logDir, `${job.name}_${logTimestamp(this.now())}`);
    const stdout = createWriteStream(`${base}.out`);
    const stderr = createWriteStream(`${base}.err`);

    entry.state = 'running';
    entry.startedAt = Date.now();

    if (cmd === undefined) {
      stderr.write('Job has an empty command\n');
      this.finish(entry, null);
      entry.done = closeStreams([stdout, stderr]);
      return;
    }

    // detached: the job becomes a process group leader, so the walltime kill
    // reaches its descendants too
    const child = spawn(cmd, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
    entry.child = child;
    child.stdout?.pipe(stdout);
    child.stderr?.pipe(stderr);

    if (job.resources.walltime !== undefined) {
      entry.timeoutId = setTimeout(() => {
        entry.killedByWalltime = true;
        killProcessGroup(child);
      }, job.resources.walltime * 1000);
    }

    entry.done = new Promise<void>((resolve) => {
      child.on('error', (err) => {
        if (!stderr.writableEnded) stderr.write(`Failed to spawn: ${err.message}\n`);
        this.finish(entry, null);
        closeStreams([stdout, stderr]).then(resolve, resolve);
      });
      child.on('close', (code) => {
        this.finish(entry, code);
        closeStreams([stdout, stderr]).then(resolve, resolve);
      });
    });
  }

  private finish(entry: LocalJob, code: number | null): void {
    if (isTerminal(entry.state)) return;
    if (entry.timeoutId) clearTimeout(entry.timeoutId);
    entry.endedAt = Date.now();
    entry.exitCode = code;
    // Killed, timed out or never started
    entry.state = code === null || entry.killedByWalltime ? 'stopped' : 'terminated';
  }
}

function killProcessGroup(child: ChildProcess): void {
  if (child.pid) {
    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch {
      // Process may have already exited
    }
  }
}

async function closeStreams(streams: WriteStream[]): Promise<void> {
  await Promise.all(
    streams.map(async (stream) => {
      if (stream.closed) return;
      stream.end();
      await once(stream, 'close');
    })
  );
}
