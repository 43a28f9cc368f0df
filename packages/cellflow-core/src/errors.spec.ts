/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for errors.ts - error types and helper functions
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CellflowError,
  ValidationError,
  UnknownStageError,
  UnknownStepError,
  OrderViolationError,
  IncompleteStageError,
  DescriptionError,
  NoDescriptionsFoundError,
  PathShapeError,
  FusionError,
  FusionShapeError,
  MonitorAbortedError,
  ConfigError,
  isNotFoundError,
  isExistsError,
  wrapError,
} from './errors.js';

describe('errors', () => {
  describe('CellflowError base class', () => {
    it('sets name to constructor name', () => {
      const err = new CellflowError('test message');
      assert.strictEqual(err.name, 'CellflowError');
      assert.strictEqual(err.message, 'test message');
      assert.ok(err instanceof Error);
    });

    it('sets name of subclasses', () => {
      const err = new UnknownStageError('x', ['a']);
      assert.strictEqual(err.name, 'UnknownStageError');
    });
  });

  describe('families', () => {
    it('groups workflow errors under ValidationError', () => {
      assert.ok(new UnknownStepError('x', []) instanceof ValidationError);
      assert.ok(new OrderViolationError('a', 'b') instanceof ValidationError);
      assert.ok(new IncompleteStageError('a', ['b']) instanceof ValidationError);
    });

    it('groups job description errors under DescriptionError', () => {
      assert.ok(new NoDescriptionsFoundError('/tmp') instanceof DescriptionError);
      assert.ok(new PathShapeError('inputs.x', 'bad') instanceof DescriptionError);
    });

    it('groups fusion errors under FusionError', () => {
      assert.ok(new FusionShapeError('/metadata/x', 'bad') instanceof FusionError);
    });
  });

  describe('messages', () => {
    it('lists known stages', () => {
      const err = new UnknownStageError('foo', ['image_conversion', 'image_analysis']);
      assert.strictEqual(err.message, "Unknown stage 'foo'. Known stages are: image_conversion, image_analysis");
      assert.strictEqual(err.stage, 'foo');
    });

    it('scopes unknown steps to a stage', () => {
      const err = new UnknownStepError('align', ['metaextract'], 'image_conversion');
      assert.strictEqual(
        err.message,
        "Unknown step 'align' for stage 'image_conversion'. Known steps are: metaextract"
      );
    });

    it('lists missing steps', () => {
      const err = new IncompleteStageError('image_conversion', ['metaconfig', 'imextract']);
      assert.strictEqual(err.message, "Stage 'image_conversion' requires the following steps: metaconfig, imextract");
      assert.deepStrictEqual(err.missing, ['metaconfig', 'imextract']);
    });

    it('lists config issues', () => {
      const err = new ConfigError('/etc/cellflow.json', ['submitCap: too small', 'verbosity: required']);
      assert.strictEqual(err.message, "Invalid configuration '/etc/cellflow.json': submitCap: too small; verbosity: required");
    });

    it('carries the last status table on abort', () => {
      const err = new MonitorAbortedError([]);
      assert.deepStrictEqual(err.lastStatus, []);
      assert.strictEqual(err.message, 'Job monitoring was aborted');
    });
  });

  describe('helpers', () => {
    it('isNotFoundError detects ENOENT', () => {
      const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
      assert.strictEqual(isNotFoundError(err), true);
      assert.strictEqual(isNotFoundError(new Error('other')), false);
      assert.strictEqual(isNotFoundError('ENOENT'), false);
    });

    it('isExistsError detects EEXIST', () => {
      const err = Object.assign(new Error('exists'), { code: 'EEXIST' });
      assert.strictEqual(isExistsError(err), true);
      assert.strictEqual(isExistsError(new Error('other')), false);
    });

    it('wrapError passes cellflow errors through', () => {
      const original = new PathShapeError('inputs.a', 'bad');
      assert.strictEqual(wrapError(original, 'context'), original);
    });

    it('wrapError adds context to other errors', () => {
      const wrapped = wrapError(new Error('disk full'), 'Failed to write');
      assert.ok(wrapped instanceof CellflowError);
      assert.strictEqual(wrapped.message, 'Failed to write: disk full');
      assert.strictEqual(wrapError('boom', 'Oops').message, 'Oops: boom');
    });
  });
});
