/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for CLI command testing
 *
 * Provides utilities for:
 * - Creating temporary experiment directories
 * - Writing test input files
 * - Cleaning up after tests
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

/**
 * Create a temporary directory for CLI testing
 */
export function createTestDir(): string {
  return mkdtempSync(join(tmpdir(), 'cellflow-cli-test-'));
}

/**
 * Remove a temporary test directory
 */
export function removeTestDir(testDir: string): void {
  rmSync(testDir, { recursive: true, force: true });
}

/**
 * Write a test file below the test directory, creating parent directories
 */
export function writeTestFile(testDir: string, filename: string, content: string): string {
  const filePath = join(testDir, filename);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}
