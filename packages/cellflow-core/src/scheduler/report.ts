/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Status table formatting and failure classification.
 */

import type { JobState, JobStatusRow } from '@cellflow/types';

/**
 * Whether a job failed: stopped, or terminated with a non-zero exit code.
 */
export function isFailed(row: JobStatusRow): boolean {
  return row.state === 'stopped' || (row.exitCode !== null && row.exitCode !== 0);
}

/** Rows of all failed jobs, in table order */
export function failedJobs(rows: readonly JobStatusRow[]): JobStatusRow[] {
  return rows.filter(isFailed);
}

/** Number of jobs per state */
export function countStates(rows: readonly JobStatusRow[]): Record<JobState, number> {
  const counts: Record<JobState, number> = {
    created: 0,
    submitted: 0,
    running: 0,
    terminated: 0,
    stopped: 0,
  };
  for (const row of rows) {
    counts[row.state]++;
  }
  return counts;
}

/**
 * Format a duration in seconds as `HH:MM:SS` (fractions are truncated).
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':');
}

const COLUMNS = ['NAME', 'STATE', 'EXIT', 'TIME', 'CPU', 'MEMORY'] as const;

function formatRow(row: JobStatusRow): string[] {
  return [
    row.name,
    row.state,
    row.exitCode === null ? '-' : String(row.exitCode),
    formatDuration(row.elapsedTime),
    row.cpuTime === null ? '-' : formatDuration(row.cpuTime),
    row.maxMemory === null ? '-' : `${row.maxMemory} MB`,
  ];
}

/**
 * Format status rows as a plain-text table with aligned columns.
 */
export function formatStatusTable(rows: readonly JobStatusRow[]): string {
  const cells = [[...COLUMNS], ...rows.map(formatRow)];
  const widths = COLUMNS.map((_, i) => Math.max(...cells.map((line) => (line[i] ?? '').length)));
  return cells
    .map((line) => line.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd())
    .join('\n');
}
