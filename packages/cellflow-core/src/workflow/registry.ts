/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Name checks against the canonical stage/step registry.
 */

import {
  STAGES,
  STAGE_NAMES,
  STEP_NAMES,
  isStageName,
  isStepName,
  type StageName,
  type StepName,
} from '@cellflow/types';
import { UnknownStageError, UnknownStepError } from '../errors.js';

/**
 * Check whether a stage is known.
 *
 * @throws {UnknownStageError} If the stage is not registered
 */
export function validateStage(name: string): StageName {
  if (!isStageName(name)) {
    throw new UnknownStageError(name, STAGE_NAMES);
  }
  return name;
}

/**
 * Check whether a step is known, optionally within a given stage.
 *
 * @param name - Step name
 * @param stage - When given, the step must belong to this stage
 * @throws {UnknownStageError} If `stage` is not registered
 * @throws {UnknownStepError} If the step is unknown or not part of `stage`
 */
export function validateStep(name: string, stage?: string): StepName {
  if (stage !== undefined) {
    const stageName = validateStage(stage);
    const steps = stageDefinition(stageName).steps;
    const step = steps.find((s) => s === name);
    if (step === undefined) {
      throw new UnknownStepError(name, steps, stageName);
    }
    return step;
  }
  if (!isStepName(name)) {
    throw new UnknownStepError(name, STEP_NAMES);
  }
  return name;
}

/**
 * Registry entry of a stage.
 */
export function stageDefinition(stage: StageName) {
  const definition = STAGES.get(stage);
  if (definition === undefined) {
    throw new UnknownStageError(stage, STAGE_NAMES);
  }
  return definition;
}
