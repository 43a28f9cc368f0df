/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Filesystem helpers shared by the file-backed stores.
 */

import { promises as fs } from 'node:fs';
import { join, dirname } from 'node:path';
import { isNotFoundError } from './errors.js';

/**
 * Write text to a file atomically (write to temp, then rename).
 *
 * Parent directories are created as needed.
 */
export async function atomicWriteText(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  const tmpPath = join(dir, `.tmp-${Date.now()}-${Math.random().toString(36).slice(2)}`);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, path);
  } catch (err) {
    // Clean up temp file on failure
    try {
      await fs.unlink(tmpPath);
    } catch {
      // Ignore cleanup errors
    }
    throw err;
  }
}

/**
 * Read a text file, returning null if it does not exist.
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * List the entries of a directory, returning an empty list if it does not exist.
 */
export async function listDirectory(path: string): Promise<string[]> {
  try {
    return await fs.readdir(path);
  } catch (err) {
    if (isNotFoundError(err)) {
      return [];
    }
    throw err;
  }
}

/**
 * Increment the integer stored in a counter file and return the new value.
 *
 * A missing counter file starts from zero.
 */
export async function nextCounter(path: string): Promise<number> {
  const data = await readTextIfExists(path);
  const current = data === null ? 0 : parseInt(data.trim(), 10) || 0;
  const next = current + 1;
  await atomicWriteText(path, String(next));
  return next;
}

/**
 * Compare strings in natural order, so `job_2` sorts before `job_10`.
 */
export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}
