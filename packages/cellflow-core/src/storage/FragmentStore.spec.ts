/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for the fragment store backends.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { FragmentFormatError, FragmentNotFoundError } from '../errors.js';
import { createTempDir, removeTempDir } from '../test-helpers.js';
import type { FragmentStore } from './interfaces.js';
import { InMemoryFragmentStore } from './in-memory/InMemoryFragmentStore.js';
import { LocalFragmentStore } from './local/LocalFragmentStore.js';

const backends: [string, () => FragmentStore][] = [
  ['InMemoryFragmentStore', () => new InMemoryFragmentStore()],
  ['LocalFragmentStore', () => new LocalFragmentStore()],
];

for (const [name, makeStore] of backends) {
  describe(name, () => {
    let dir: string;
    let store: FragmentStore;
    let file: string;

    beforeEach(async () => {
      dir = createTempDir();
      store = makeStore();
      file = join(dir, 'fragment.json');
      await store.create(file, '/objects/cells/features/area', { dtype: 'int', shape: [3], values: [10, 20, 30] });
      await store.create(file, '/objects/cells/segmentation/object_ids', { dtype: 'int', shape: [3], values: [1, 2, 3] });
      await store.create(file, '/metadata/plate', { dtype: 'string', shape: [1], values: ['P1'] });
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    it('reports existence of files, groups and datasets', async () => {
      assert.strictEqual(await store.exists(file), true);
      assert.strictEqual(await store.exists(file, '/objects/cells'), true);
      assert.strictEqual(await store.exists(file, '/objects/cells/features/area'), true);
      assert.strictEqual(await store.exists(file, '/objects/nuclei'), false);
      assert.strictEqual(await store.exists(join(dir, 'other.json')), false);
    });

    it('lists groups and datasets', async () => {
      assert.deepStrictEqual(await store.listGroups(file, '/'), ['objects', 'metadata']);
      assert.deepStrictEqual(await store.listGroups(file, '/objects/cells'), ['features', 'segmentation']);
      assert.deepStrictEqual(await store.listDatasets(file, '/metadata'), ['plate']);
    });

    it('reads datasets', async () => {
      assert.strictEqual(await store.getType(file, '/metadata/plate'), 'string');
      assert.deepStrictEqual(await store.getDimensions(file, '/objects/cells/features/area'), [3]);
      assert.deepStrictEqual(await store.read(file, '/objects/cells/features/area'), {
        dtype: 'int',
        shape: [3],
        values: [10, 20, 30],
      });
    });

    it('fails for missing datasets and groups', async () => {
      await assert.rejects(store.read(file, '/metadata/well'), FragmentNotFoundError);
      await assert.rejects(store.listDatasets(file, '/objects/nuclei'), FragmentNotFoundError);
      await assert.rejects(store.read(join(dir, 'other.json'), '/metadata/plate'), FragmentNotFoundError);
    });

    it('preallocates and writes rows at an offset', async () => {
      const out = join(dir, 'out.json');
      await store.preallocate(out, '/objects/cells/features/area', 'float', [5]);
      await store.write(out, '/objects/cells/features/area', [1.5, 2.5], 3);
      assert.deepStrictEqual((await store.read(out, '/objects/cells/features/area')).values, [0, 0, 0, 1.5, 2.5]);
    });

    it('rejects writes out of bounds', async () => {
      await assert.rejects(store.write(file, '/objects/cells/features/area', [1, 2], 2), FragmentFormatError);
    });

    it('rejects values of the wrong type', async () => {
      await assert.rejects(store.write(file, '/objects/cells/features/area', [1.5], 0), FragmentFormatError);
      await assert.rejects(
        store.create(file, '/metadata/well', { dtype: 'bool', shape: [1], values: ['yes'] }),
        FragmentFormatError
      );
    });

    it('rejects values that do not match the shape', async () => {
      await assert.rejects(
        store.create(file, '/metadata/well', { dtype: 'int', shape: [2], values: [1] }),
        FragmentFormatError
      );
    });

    it('removes files', async () => {
      await store.flush();
      await store.remove(file);
      assert.strictEqual(await store.exists(file), false);
    });
  });
}

describe('LocalFragmentStore persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('writes documents on flush', async () => {
    const file = join(dir, 'fragment.json');
    const store = new LocalFragmentStore();
    await store.create(file, '/metadata/site', { dtype: 'int', shape: [1], values: [7] });
    assert.strictEqual(existsSync(file), false);

    await store.flush();
    const doc: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    assert.deepStrictEqual(doc, {
      format: 'cellflow-fragment',
      version: 1,
      root: {
        groups: {
          metadata: { groups: {}, datasets: { site: { dtype: 'int', shape: [1], values: [7] } } },
        },
        datasets: {},
      },
    });

    const reopened = new LocalFragmentStore();
    assert.deepStrictEqual((await reopened.read(file, '/metadata/site')).values, [7]);
  });

  it('rejects files that are not fragments', async () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, JSON.stringify({ format: 'other' }));
    await assert.rejects(new LocalFragmentStore().read(file, '/x'), FragmentFormatError);
  });

  it('rejects datasets whose values do not match the shape', async () => {
    const file = join(dir, 'bad.json');
    writeFileSync(
      file,
      JSON.stringify({
        format: 'cellflow-fragment',
        version: 1,
        root: { groups: {}, datasets: { x: { dtype: 'int', shape: [2], values: [1] } } },
      })
    );
    await assert.rejects(new LocalFragmentStore().exists(file), FragmentFormatError);
  });
});
