/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { IncompleteStageError, WorkflowDescriptionFormatError } from '../errors.js';
import { createTempDir, removeTempDir } from '../test-helpers.js';
import {
  dumpWorkflowDescription,
  loadWorkflowDescription,
  parseWorkflowDocument,
} from './loader.js';

const WORKFLOW_YAML = `
stages:
  - name: image_conversion
    steps:
      - name: metaextract
      - name: metaconfig
        args:
          format: cellvoyager
      - name: imextract
  - name: image_analysis
    steps:
      - name: jterator
        args:
          pipeline: cells
`;

describe('workflow loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('parses a workflow document', () => {
    const doc = parseWorkflowDocument(WORKFLOW_YAML);
    assert.strictEqual(doc.stages.length, 2);
    assert.deepStrictEqual(doc.stages[1], { name: 'image_analysis', steps: [{ name: 'jterator', args: { pipeline: 'cells' } }] });
  });

  it('rejects documents without stages', () => {
    assert.throws(
      () => parseWorkflowDocument('steps: []', 'bad.yaml'),
      (err: unknown) =>
        err instanceof WorkflowDescriptionFormatError && err.source === 'bad.yaml' && err.reason.startsWith('stages:')
    );
  });

  it('rejects malformed YAML', () => {
    assert.throws(() => parseWorkflowDocument('stages: [', 'broken.yaml'), WorkflowDescriptionFormatError);
  });

  it('loads and validates a workflow file', async () => {
    const file = join(dir, 'workflow.yaml');
    writeFileSync(file, WORKFLOW_YAML);
    const warnings: string[] = [];

    const workflow = await loadWorkflowDescription(file, { onWarning: (m) => warnings.push(m) });

    assert.deepStrictEqual(workflow.stageNames, ['image_conversion', 'image_analysis']);
    assert.deepStrictEqual(warnings, ["Stage 'image_analysis' requires upstream stage 'image_preprocessing'"]);
  });

  it('fails validation for incomplete stages', async () => {
    const file = join(dir, 'workflow.yaml');
    writeFileSync(file, 'stages:\n  - name: image_preprocessing\n    steps:\n      - name: corilla\n');
    await assert.rejects(loadWorkflowDescription(file, { onWarning: () => {} }), IncompleteStageError);
  });

  it('dumps a workflow that parses back to the same document', async () => {
    const file = join(dir, 'workflow.yaml');
    writeFileSync(file, WORKFLOW_YAML);
    const workflow = await loadWorkflowDescription(file, { onWarning: () => {} });

    assert.deepStrictEqual(parseWorkflowDocument(dumpWorkflowDescription(workflow)), workflow.toObject());
  });
});
