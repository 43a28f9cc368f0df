/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export {
  fuseDatasets,
  mergeDatasets,
  discoverLayout,
  type FuseOptions,
  type FusionLayout,
} from './fuse.js';
