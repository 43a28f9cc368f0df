/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Process resource sampling from /proc.
 *
 * Used by LocalExecutionEngine to report cpu time and peak memory of running
 * jobs. On systems without /proc the samples are null.
 */

import * as fs from 'fs/promises';

/** Clock ticks per second used by /proc/<pid>/stat (USER_HZ) */
const CLOCK_TICKS = 100;

/**
 * Get the cpu time (user + system) of a process in seconds.
 * Reads utime (field 14) and stime (field 15) from /proc/<pid>/stat.
 */
export async function getCpuTime(pid: number): Promise<number | null> {
  try {
    const data = await fs.readFile(`/proc/${pid}/stat`, 'utf-8');
    // comm (field 2) can contain spaces and is in parens
    const closeParen = data.lastIndexOf(')');
    const fields = data.slice(closeParen + 2).split(' ');
    // After the closing paren, index 0 is field 3, so utime is at 11 and stime at 12
    const utime = parseInt(fields[11] ?? '', 10);
    const stime = parseInt(fields[12] ?? '', 10);
    if (Number.isNaN(utime) || Number.isNaN(stime)) return null;
    return (utime + stime) / CLOCK_TICKS;
  } catch {
    return null;
  }
}

/**
 * Get the peak resident memory of a process in megabytes.
 * Reads VmHWM from /proc/<pid>/status.
 */
export async function getPeakMemory(pid: number): Promise<number | null> {
  try {
    const data = await fs.readFile(`/proc/${pid}/status`, 'utf-8');
    const match = /^VmHWM:\s+(\d+)\s+kB$/m.exec(data);
    if (!match) return null;
    return Math.round(Number(match[1]) / 1024);
  } catch {
    return null;
  }
}
