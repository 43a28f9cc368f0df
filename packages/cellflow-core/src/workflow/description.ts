/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Validated workflow descriptions.
 *
 * A workflow is an ordered list of stages, each an ordered list of steps.
 * Descriptions are append-only: ordering is the insertion order, checked
 * against the registry as stages and steps are added. Validation is linear
 * in the number of stages and steps.
 */

import { STEP_DEPENDENCIES } from '@cellflow/types';
import type {
  StageName,
  StepName,
  StepArgs,
  StageDocument,
  WorkflowDocument,
} from '@cellflow/types';
import {
  DuplicateStageError,
  DuplicateStepError,
  IncompleteStageError,
  MissingUpstreamStepError,
  OrderViolationError,
  StageLockedError,
} from '../errors.js';
import { stageDefinition, validateStage, validateStep } from './registry.js';

/** Stages added to a workflow */
const lockedStages = new WeakSet<StageDescription>();

/**
 * Options for building workflow descriptions.
 */
export interface WorkflowDescriptionOptions {
  /**
   * Called for problems that do not invalidate the workflow, such as a stage
   * whose upstream stage is not described (default: console.warn).
   */
  onWarning?: (message: string) => void;
}

/**
 * A step with its arguments.
 */
export class StepDescription {
  readonly name: StepName;
  readonly args: Readonly<StepArgs>;

  /**
   * @throws {UnknownStepError} If the step is not registered
   */
  constructor(name: string, args: StepArgs = {}) {
    this.name = validateStep(name);
    this.args = { ...args };
  }

  toObject(): { name: string; args: StepArgs } {
    return { name: this.name, args: { ...this.args } };
  }
}

/**
 * A stage with its ordered steps.
 */
export class StageDescription {
  readonly name: StageName;
  private readonly _steps: StepDescription[] = [];

  /**
   * @throws {UnknownStageError} If the stage is not registered
   */
  constructor(name: string, steps: StepDescription[] = []) {
    this.name = validateStage(name);
    for (const step of steps) {
      this.addStep(step);
    }
  }

  get steps(): readonly StepDescription[] {
    return this._steps;
  }

  get stepNames(): StepName[] {
    return this._steps.map((s) => s.name);
  }

  /**
   * Append a step to the stage.
   *
   * @throws {UnknownStepError} If the step does not belong to this stage
   * @throws {DuplicateStepError} If the step was already added
   * @throws {MissingUpstreamStepError} If a required upstream step is missing
   * @throws {StageLockedError} If the stage was already added to a workflow
   */
  addStep(step: StepDescription): void {
    if (lockedStages.has(this)) {
      throw new StageLockedError(this.name);
    }
    validateStep(step.name, this.name);

    const present = this.stepNames;
    if (present.includes(step.name)) {
      throw new DuplicateStepError(step.name, this.name);
    }

    for (const upstream of STEP_DEPENDENCIES.get(step.name) ?? []) {
      if (!present.includes(upstream)) {
        throw new MissingUpstreamStepError(step.name, upstream);
      }
    }

    this._steps.push(step);
  }

  getStep(name: string): StepDescription | undefined {
    return this._steps.find((s) => s.name === name);
  }

  toObject(): Required<StageDocument> {
    return { name: this.name, steps: this._steps.map((s) => s.toObject()) };
  }
}

/**
 * An ordered, validated sequence of stages.
 *
 * @example
 * ```typescript
 * const workflow = new WorkflowDescription();
 * workflow.addStage(new StageDescription('image_conversion', [
 *   new StepDescription('metaextract'),
 *   new StepDescription('metaconfig', { format: 'cellvoyager' }),
 *   new StepDescription('imextract'),
 * ]));
 * ```
 */
export class WorkflowDescription {
  private readonly _stages: StageDescription[] = [];
  private readonly onWarning: (message: string) => void;

  constructor(options: WorkflowDescriptionOptions = {}) {
    this.onWarning = options.onWarning ?? ((message) => console.warn(`Warning: ${message}`));
  }

  /**
   * Build a description from its plain-object form.
   *
   * @throws {ValidationError} If any stage or step is invalid
   */
  static fromObject(doc: WorkflowDocument, options: WorkflowDescriptionOptions = {}): WorkflowDescription {
    const workflow = new WorkflowDescription(options);
    for (const stage of doc.stages) {
      const steps = (stage.steps ?? []).map((s) => new StepDescription(s.name, s.args));
      workflow.addStage(new StageDescription(stage.name, steps));
    }
    return workflow;
  }

  get stages(): readonly StageDescription[] {
    return this._stages;
  }

  get stageNames(): StageName[] {
    return this._stages.map((s) => s.name);
  }

  /**
   * Append a stage to the workflow.
   *
   * Missing upstream stages are reported as warnings only. A stage that an
   * already-added stage depends on can never be added afterwards.
   *
   * @throws {DuplicateStageError} If the stage was already added
   * @throws {OrderViolationError} If an added stage requires this one upstream
   * @throws {IncompleteStageError} If a required step of the stage is missing
   */
  addStage(stage: StageDescription): void {
    const present = this.stageNames;
    if (present.includes(stage.name)) {
      throw new DuplicateStageError(stage.name);
    }

    const definition = stageDefinition(stage.name);

    for (const upstream of definition.upstream) {
      if (!present.includes(upstream)) {
        this.onWarning(`Stage '${stage.name}' requires upstream stage '${upstream}'`);
      }
    }

    for (const existing of present) {
      if (stageDefinition(existing).upstream.includes(stage.name)) {
        throw new OrderViolationError(stage.name, existing);
      }
    }

    const described = stage.stepNames;
    const missing = definition.required.filter((step) => !described.includes(step));
    if (missing.length > 0) {
      throw new IncompleteStageError(stage.name, missing);
    }

    lockedStages.add(stage);
    this._stages.push(stage);
  }

  getStage(name: string): StageDescription | undefined {
    return this._stages.find((s) => s.name === name);
  }

  getStep(stage: string, step: string): StepDescription | undefined {
    return this.getStage(stage)?.getStep(step);
  }

  /**
   * All steps of the workflow in execution order.
   */
  steps(): StepDescription[] {
    return this._stages.flatMap((s) => [...s.steps]);
  }

  toObject(): WorkflowDocument {
    return { stages: this._stages.map((s) => s.toObject()) };
  }
}
