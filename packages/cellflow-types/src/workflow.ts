/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Plain-object form of a workflow description, as read from and written to
 * workflow description files.
 *
 * @example
 * ```yaml
 * stages:
 *   - name: image_conversion
 *     steps:
 *       - name: metaextract
 *       - name: metaconfig
 *         args:
 *           format: cellvoyager
 *       - name: imextract
 * ```
 */

/** Opaque step arguments */
export type StepArgs = Record<string, unknown>;

export interface StepDocument {
  name: string;
  args?: StepArgs;
}

export interface StageDocument {
  name: string;
  steps?: StepDocument[];
}

export interface WorkflowDocument {
  stages: StageDocument[];
}
