/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { validateStage, validateStep, stageDefinition } from './registry.js';
export {
  StepDescription,
  StageDescription,
  WorkflowDescription,
  type WorkflowDescriptionOptions,
} from './description.js';
export {
  WorkflowDocumentSchema,
  parseWorkflowDocument,
  loadWorkflowDescription,
  dumpWorkflowDescription,
} from './loader.js';
