/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Workflow description files (YAML).
 */

import * as fs from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { WorkflowDocument } from '@cellflow/types';
import { WorkflowDescriptionFormatError } from '../errors.js';
import { WorkflowDescription, type WorkflowDescriptionOptions } from './description.js';

const StepDocumentSchema = z.object({
  name: z.string().min(1, 'step name is required'),
  args: z.record(z.string(), z.unknown()).optional(),
});

const StageDocumentSchema = z.object({
  name: z.string().min(1, 'stage name is required'),
  steps: z.array(StepDocumentSchema).optional(),
});

export const WorkflowDocumentSchema = z.object({
  stages: z.array(StageDocumentSchema),
});

/**
 * Parse and validate a workflow document from YAML text.
 *
 * @param text - YAML (or JSON) text
 * @param source - Name used in error messages
 * @throws {WorkflowDescriptionFormatError} If the text is not a workflow document
 */
export function parseWorkflowDocument(text: string, source = '<input>'): WorkflowDocument {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new WorkflowDescriptionFormatError(source, err instanceof Error ? err.message : String(err));
  }

  const result = WorkflowDocumentSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new WorkflowDescriptionFormatError(source, reason);
  }
  return result.data;
}

/**
 * Load and validate a workflow description file.
 *
 * @throws {WorkflowDescriptionFormatError} If the file is not a workflow document
 * @throws {ValidationError} If the described stages or steps are invalid
 */
export async function loadWorkflowDescription(
  file: string,
  options: WorkflowDescriptionOptions = {}
): Promise<WorkflowDescription> {
  const text = await fs.readFile(file, 'utf-8');
  return WorkflowDescription.fromObject(parseWorkflowDocument(text, file), options);
}

/**
 * Serialize a workflow description as YAML.
 */
export function dumpWorkflowDescription(workflow: WorkflowDescription): string {
  return yaml.dump(workflow.toObject(), { noRefs: true });
}
