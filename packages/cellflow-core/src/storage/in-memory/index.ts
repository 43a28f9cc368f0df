/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { InMemoryExperimentStore } from './InMemoryExperimentStore.js';
export { InMemoryFragmentStore } from './InMemoryFragmentStore.js';
