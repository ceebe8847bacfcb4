/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for codec.ts - view file encoding, atomic writes and rebasing
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { none, some, variant } from '@elaraai/east';
import type { ViewFile, ViewNode } from '@dataviews/types';
import {
  viewFileDecode,
  viewFileEncode,
  viewFileRead,
  viewFileRebase,
  viewFileRoot,
  viewFileWrite,
  writeAtomic,
} from './codec.js';
import { InvalidViewFileError } from './errors.js';
import { jsonPersister } from './strategies.js';
import { createTempDir, removeTempDir } from './test-helpers.js';

const params = new Uint8Array([1, 2, 3]);

function node(targets: ViewNode['targets'], savedPath: string | null = null): ViewNode {
  return {
    targets,
    derivation: { name: 'read_text', params },
    persister: { name: jsonPersister.name, params: jsonPersister.params },
    savedPath: savedPath === null ? none : some(savedPath),
  };
}

function paths(file: ViewFile): string[][] {
  return file.nodes.map(n => n.targets.map(t => (t.type === 'path' ? t.value : `#${t.value}`)));
}

describe('codec', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('viewFileEncode / viewFileDecode', () => {
    it('decodes what it encodes', () => {
      const file: ViewFile = {
        root: 0n,
        nodes: [
          node([variant('view', 1n), variant('path', '/dataviews-a/b.csv')], '/dataviews-a/top.view'),
          node([variant('path', '/dataviews-a/c.csv')]),
        ],
      };

      const decoded = viewFileDecode(viewFileEncode(file));

      assert.strictEqual(decoded.root, 0n);
      assert.deepStrictEqual(paths(decoded), [['#1', '/dataviews-a/b.csv'], ['/dataviews-a/c.csv']]);
      assert.strictEqual(decoded.nodes[0]?.derivation.name, 'read_text');
      assert.deepStrictEqual([...(decoded.nodes[0]?.derivation.params ?? [])], [1, 2, 3]);
      assert.strictEqual(decoded.nodes[1]?.savedPath.type, 'none');
    });

    it('rejects empty input', () => {
      assert.throws(
        () => viewFileDecode(new Uint8Array()),
        InvalidViewFileError
      );
    });
  });

  describe('viewFileRead / viewFileWrite', () => {
    it('writes a file that reads back', async () => {
      const filePath = join(testDir, 'a.view');
      await viewFileWrite(filePath, { root: 0n, nodes: [node([variant('path', '/dataviews-a/x')])] });

      const file = await viewFileRead(filePath);

      assert.deepStrictEqual(paths(file), [['/dataviews-a/x']]);
    });

    it('fails reading empty files', async () => {
      const filePath = join(testDir, 'broken.view');
      writeFileSync(filePath, '');

      await assert.rejects(() => viewFileRead(filePath), InvalidViewFileError);
    });
  });

  describe('writeAtomic', () => {
    it('leaves only the destination file behind', async () => {
      await writeAtomic(join(testDir, 'out.bin'), new Uint8Array([7]));

      assert.deepStrictEqual(readdirSync(testDir), ['out.bin']);
    });

    it('removes the partial file when the write fails', async () => {
      const destination = join(testDir, 'missing', 'out.bin');

      await assert.rejects(
        () => writeAtomic(destination, new Uint8Array([7])),
        (err: unknown) => err instanceof Error && 'code' in err && err.code === 'ENOENT'
      );
      assert.strictEqual(existsSync(`${destination}.partial`), false);
    });
  });

  describe('viewFileRoot', () => {
    it('returns the root node', () => {
      const root = node([variant('path', '/dataviews-a/root.csv')]);
      const file: ViewFile = { root: 1n, nodes: [node([]), root] };

      assert.strictEqual(viewFileRoot(file), root);
    });

    it('throws for an out-of-range root', () => {
      assert.throws(
        () => viewFileRoot({ root: 2n, nodes: [node([])] }),
        (err: unknown) =>
          err instanceof InvalidViewFileError &&
          err.message === 'Invalid view file: root index 2 out of range (1 nodes)'
      );
    });
  });

  describe('viewFileRebase', () => {
    it('rebases path targets of every node', () => {
      const file: ViewFile = {
        root: 0n,
        nodes: [
          node([variant('view', 1n), variant('path', '/dataviews-a/b/top.csv')]),
          node([variant('path', '/dataviews-a/e.csv')]),
        ],
      };

      const rebased = viewFileRebase(file, '/dataviews-a/b', '/dataviews-x/y');

      assert.deepStrictEqual(paths(rebased), [['#1', '/dataviews-x/y/top.csv'], ['/dataviews-x/e.csv']]);
    });

    it('keeps saved paths and leaves the input unchanged', () => {
      const file: ViewFile = {
        root: 0n,
        nodes: [node([variant('path', '/dataviews-a/b/top.csv')], '/dataviews-a/b/top.view')],
      };

      const rebased = viewFileRebase(file, '/dataviews-a/b', '/dataviews-x/y');
      const savedPath = rebased.nodes[0]?.savedPath;

      assert.strictEqual(savedPath?.type === 'some' ? savedPath.value : null, '/dataviews-a/b/top.view');
      assert.deepStrictEqual(paths(file), [['/dataviews-a/b/top.csv']]);
    });
  });
});
