/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Storage abstraction layer for cellflow.
 *
 * - Local*: Filesystem (default, for the CLI)
 * - InMemory*: For testing
 */

export type { ExperimentStore, FragmentStore } from './interfaces.js';
export {
  FragmentTree,
  FragmentDocumentSchema,
  splitPath,
  joinPath,
  type GroupNode,
  type FragmentDocument,
} from './fragment-tree.js';
export { LocalExperimentStore, LocalFragmentStore } from './local/index.js';
export { InMemoryExperimentStore, InMemoryFragmentStore } from './in-memory/index.js';
