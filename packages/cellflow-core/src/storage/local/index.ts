/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { LocalExperimentStore } from './LocalExperimentStore.js';
export { LocalFragmentStore } from './LocalFragmentStore.js';
