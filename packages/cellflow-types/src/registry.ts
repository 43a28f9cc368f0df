/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Canonical workflow registry.
 *
 * The stage/step universe is small and fixed, so ordering is checked against
 * this declarative table instead of being discovered from a runtime graph.
 * Insertion order of the tables is the canonical execution order.
 */

/** Implemented workflow stages, in canonical order */
export const STAGE_NAMES = [
  'image_conversion',
  'image_preprocessing',
  'pyramid_creation',
  'image_analysis',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Implemented workflow steps, in canonical order */
export const STEP_NAMES = [
  'metaextract',
  'metaconfig',
  'imextract',
  'corilla',
  'align',
  'illuminati',
  'jterator',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

/**
 * Registry entry for a single stage.
 */
export interface StageDefinition {
  /** Steps belonging to the stage, in execution order */
  readonly steps: readonly StepName[];
  /** Steps that must be described for the stage to be complete */
  readonly required: readonly StepName[];
  /** Stages that must run before this one */
  readonly upstream: readonly StageName[];
}

/**
 * Steps per stage and dependencies between stages.
 */
export const STAGES: ReadonlyMap<StageName, StageDefinition> = new Map<StageName, StageDefinition>([
  ['image_conversion', {
    steps: ['metaextract', 'metaconfig', 'imextract'],
    required: ['metaextract', 'metaconfig', 'imextract'],
    upstream: [],
  }],
  ['image_preprocessing', {
    steps: ['corilla', 'align'],
    required: ['corilla', 'align'],
    upstream: ['image_conversion'],
  }],
  ['pyramid_creation', {
    steps: ['illuminati'],
    required: ['illuminati'],
    upstream: ['image_conversion', 'image_preprocessing'],
  }],
  ['image_analysis', {
    steps: ['jterator'],
    required: ['jterator'],
    upstream: ['image_conversion', 'image_preprocessing'],
  }],
]);

/**
 * Dependencies between steps within one stage.
 * Steps without an entry have no upstream steps.
 */
export const STEP_DEPENDENCIES: ReadonlyMap<StepName, readonly StepName[]> = new Map<StepName, readonly StepName[]>([
  ['metaextract', []],
  ['metaconfig', ['metaextract']],
  ['imextract', ['metaconfig']],
]);

export function isStageName(name: string): name is StageName {
  return STAGE_NAMES.some((stage) => stage === name);
}

export function isStepName(name: string): name is StepName {
  return STEP_NAMES.some((step) => step === name);
}

/**
 * Stage that owns a step.
 */
export function stageOfStep(step: StepName): StageName {
  for (const [stage, definition] of STAGES) {
    if (definition.steps.includes(step)) return stage;
  }
  // Every step is listed under exactly one stage
  throw new Error(`Step '${step}' is not assigned to a stage`);
}
