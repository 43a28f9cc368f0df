/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { Success } from './Success.js';
export { Error } from './Error.js';
export { MonitorView, type MonitorViewProps } from './MonitorView.js';
