/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for workflow descriptions and registry checks
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DuplicateStageError,
  DuplicateStepError,
  IncompleteStageError,
  MissingUpstreamStepError,
  OrderViolationError,
  StageLockedError,
  UnknownStageError,
  UnknownStepError,
} from '../errors.js';
import { StageDescription, StepDescription, WorkflowDescription } from './description.js';
import { validateStage, validateStep } from './registry.js';

function conversionStage(): StageDescription {
  return new StageDescription('image_conversion', [
    new StepDescription('metaextract'),
    new StepDescription('metaconfig', { format: 'cellvoyager' }),
    new StepDescription('imextract'),
  ]);
}

function preprocessingStage(): StageDescription {
  return new StageDescription('image_preprocessing', [
    new StepDescription('corilla'),
    new StepDescription('align', { ref_cycle: 0 }),
  ]);
}

function collectWarnings(): { warnings: string[]; onWarning: (message: string) => void } {
  const warnings: string[] = [];
  return { warnings, onWarning: (message) => warnings.push(message) };
}

describe('registry', () => {
  it('accepts registered stages', () => {
    assert.strictEqual(validateStage('image_analysis'), 'image_analysis');
  });

  it('rejects unknown stages', () => {
    assert.throws(() => validateStage('segmentation'), UnknownStageError);
  });

  it('accepts registered steps with and without a stage', () => {
    assert.strictEqual(validateStep('jterator'), 'jterator');
    assert.strictEqual(validateStep('corilla', 'image_preprocessing'), 'corilla');
  });

  it('rejects steps of another stage', () => {
    assert.throws(
      () => validateStep('jterator', 'image_conversion'),
      (err: unknown) => err instanceof UnknownStepError && err.stage === 'image_conversion'
    );
  });

  it('rejects unknown steps', () => {
    assert.throws(() => validateStep('cellprofiler'), UnknownStepError);
  });
});

describe('StageDescription', () => {
  it('keeps steps in insertion order', () => {
    assert.deepStrictEqual(conversionStage().stepNames, ['metaextract', 'metaconfig', 'imextract']);
  });

  it('rejects a step whose upstream step is missing', () => {
    assert.throws(
      () => new StageDescription('image_conversion', [new StepDescription('metaconfig')]),
      (err: unknown) =>
        err instanceof MissingUpstreamStepError && err.step === 'metaconfig' && err.upstream === 'metaextract'
    );
  });

  it('rejects duplicate steps', () => {
    const stage = new StageDescription('image_conversion', [new StepDescription('metaextract')]);
    assert.throws(() => stage.addStep(new StepDescription('metaextract')), DuplicateStepError);
  });

  it('rejects steps of another stage', () => {
    const stage = new StageDescription('image_analysis');
    assert.throws(() => stage.addStep(new StepDescription('illuminati')), UnknownStepError);
  });

  it('looks up steps by name', () => {
    assert.deepStrictEqual(conversionStage().getStep('metaconfig')?.args, { format: 'cellvoyager' });
    assert.strictEqual(conversionStage().getStep('align'), undefined);
  });
});

describe('WorkflowDescription', () => {
  it('keeps stages in insertion order', () => {
    const { warnings, onWarning } = collectWarnings();
    const workflow = new WorkflowDescription({ onWarning });
    workflow.addStage(conversionStage());
    workflow.addStage(preprocessingStage());
    workflow.addStage(new StageDescription('image_analysis', [new StepDescription('jterator')]));

    assert.deepStrictEqual(workflow.stageNames, ['image_conversion', 'image_preprocessing', 'image_analysis']);
    assert.deepStrictEqual(
      workflow.steps().map((s) => s.name),
      ['metaextract', 'metaconfig', 'imextract', 'corilla', 'align', 'jterator']
    );
    assert.deepStrictEqual(warnings, []);
  });

  it('looks up steps by stage and name', () => {
    const workflow = new WorkflowDescription();
    workflow.addStage(conversionStage());

    assert.deepStrictEqual(workflow.getStep('image_conversion', 'metaconfig')?.args, { format: 'cellvoyager' });
    assert.strictEqual(workflow.getStep('image_analysis', 'jterator'), undefined);
  });

  it('rejects new steps once a stage is added', () => {
    const { onWarning } = collectWarnings();
    const workflow = new WorkflowDescription({ onWarning });
    const stage = new StageDescription('image_analysis', [new StepDescription('jterator')]);
    workflow.addStage(stage);

    assert.throws(
      () => stage.addStep(new StepDescription('jterator')),
      (err: unknown) => err instanceof StageLockedError && err.stage === 'image_analysis'
    );
    assert.deepStrictEqual(workflow.getStage('image_analysis')?.stepNames, ['jterator']);
  });

  it('leaves rejected stages open for more steps', () => {
    const workflow = new WorkflowDescription();
    const stage = new StageDescription('image_conversion', [new StepDescription('metaextract')]);
    assert.throws(() => workflow.addStage(stage), IncompleteStageError);

    stage.addStep(new StepDescription('metaconfig'));
    stage.addStep(new StepDescription('imextract'));
    workflow.addStage(stage);
    assert.deepStrictEqual(workflow.stageNames, ['image_conversion']);
  });

  it('rejects duplicate stages', () => {
    const workflow = new WorkflowDescription();
    workflow.addStage(conversionStage());
    assert.throws(() => workflow.addStage(conversionStage()), DuplicateStageError);
  });

  it('rejects a stage required upstream of an added stage', () => {
    const { onWarning } = collectWarnings();
    const workflow = new WorkflowDescription({ onWarning });
    workflow.addStage(new StageDescription('image_analysis', [new StepDescription('jterator')]));

    assert.throws(
      () => workflow.addStage(conversionStage()),
      (err: unknown) =>
        err instanceof OrderViolationError && err.stage === 'image_conversion' && err.downstream === 'image_analysis'
    );
    assert.deepStrictEqual(workflow.stageNames, ['image_analysis']);
  });

  it('warns about missing upstream stages', () => {
    const { warnings, onWarning } = collectWarnings();
    const workflow = new WorkflowDescription({ onWarning });
    workflow.addStage(new StageDescription('pyramid_creation', [new StepDescription('illuminati')]));

    assert.deepStrictEqual(warnings, [
      "Stage 'pyramid_creation' requires upstream stage 'image_conversion'",
      "Stage 'pyramid_creation' requires upstream stage 'image_preprocessing'",
    ]);
    assert.deepStrictEqual(workflow.stageNames, ['pyramid_creation']);
  });

  it('rejects stages missing a required step', () => {
    const workflow = new WorkflowDescription();
    const stage = new StageDescription('image_conversion', [new StepDescription('metaextract')]);
    assert.throws(
      () => workflow.addStage(stage),
      (err: unknown) =>
        err instanceof IncompleteStageError && err.missing.join(',') === 'metaconfig,imextract'
    );
  });

  it('round-trips through its plain-object form', () => {
    const workflow = new WorkflowDescription();
    workflow.addStage(conversionStage());
    workflow.addStage(preprocessingStage());

    const doc = workflow.toObject();
    assert.deepStrictEqual(doc, {
      stages: [
        {
          name: 'image_conversion',
          steps: [
            { name: 'metaextract', args: {} },
            { name: 'metaconfig', args: { format: 'cellvoyager' } },
            { name: 'imextract', args: {} },
          ],
        },
        {
          name: 'image_preprocessing',
          steps: [
            { name: 'corilla', args: {} },
            { name: 'align', args: { ref_cycle: 0 } },
          ],
        },
      ],
    });
    assert.deepStrictEqual(WorkflowDescription.fromObject(doc).toObject(), doc);
  });
});
