/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigError } from './errors.js';
import { getConfigPath, loadConfig, parseConfig } from './config.js';
import { createTempDir, removeTempDir } from './test-helpers.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('applies defaults', () => {
    const config = parseConfig({}, 'test', { CELLFLOW_HOME: '/srv/cellflow' });
    assert.deepStrictEqual(config, {
      home: '/srv/cellflow',
      monitoringInterval: 5,
      submitCap: 2000,
      verbosity: 0,
      planners: [],
      launcher: ['cellflow'],
      run: {},
      collect: { walltime: '02:00:00', memory: 4000 },
    });
  });

  it('keeps configured values', () => {
    const config = parseConfig(
      {
        home: 'data',
        monitoringInterval: 10,
        run: { walltime: '01:00:00', cores: 2 },
        collect: { memory: 8000 },
      },
      'test',
      {}
    );
    assert.strictEqual(config.home, resolve('data'));
    assert.strictEqual(config.monitoringInterval, 10);
    assert.deepStrictEqual(config.run, { walltime: '01:00:00', cores: 2 });
    assert.deepStrictEqual(config.collect, { walltime: '02:00:00', memory: 8000 });
  });

  it('reports every invalid field', () => {
    assert.throws(
      () => parseConfig({ submitCap: 0, run: { walltime: '1h' } }, 'test', {}),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.issues.length === 2 &&
        err.issues[0]?.startsWith('submitCap: ') === true &&
        err.issues[1] === 'run.walltime: must have the format HH:MM:SS'
    );
  });

  it('reads the file named by CELLFLOW_CONFIG', () => {
    const file = join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ submitCap: 10 }));
    const env = { CELLFLOW_CONFIG: file, CELLFLOW_HOME: dir };

    assert.strictEqual(getConfigPath(env), file);
    assert.strictEqual(loadConfig(env).submitCap, 10);
  });

  it('uses defaults when the file does not exist', () => {
    const config = loadConfig({ CELLFLOW_CONFIG: join(dir, 'missing.json'), CELLFLOW_HOME: dir });
    assert.strictEqual(config.submitCap, 2000);
    assert.strictEqual(config.home, dir);
  });

  it('rejects files that are not JSON', () => {
    const file = join(dir, 'config.json');
    writeFileSync(file, 'submitCap: 10');
    assert.throws(() => loadConfig({ CELLFLOW_CONFIG: file }), ConfigError);
  });
});
