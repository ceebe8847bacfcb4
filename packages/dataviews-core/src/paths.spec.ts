/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for paths.ts - canonicalization and rebasing
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, realpathSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { canonicalPath, rebasePath } from './paths.js';
import { createTempDir, removeTempDir, writeTestFile } from './test-helpers.js';

describe('paths', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('canonicalPath', () => {
    it('eliminates . and .. segments', () => {
      assert.strictEqual(canonicalPath('/dataviews-missing/b/../c/./d.txt'), '/dataviews-missing/c/d.txt');
    });

    it('resolves relative paths against the working directory', () => {
      const expected = join(realpathSync(process.cwd()), 'dataviews-no-such-file.txt');
      assert.strictEqual(canonicalPath('dataviews-no-such-file.txt'), expected);
    });

    it('returns existing paths unchanged', () => {
      const file = writeTestFile(testDir, 'data/a.txt', 'a');
      assert.strictEqual(canonicalPath(file), file);
    });

    it('resolves symlinked directories', () => {
      mkdirSync(join(testDir, 'real'));
      writeTestFile(testDir, 'real/a.txt', 'a');
      symlinkSync(join(testDir, 'real'), join(testDir, 'link'), 'dir');

      assert.strictEqual(canonicalPath(join(testDir, 'link', 'a.txt')), join(testDir, 'real', 'a.txt'));
    });

    it('resolves the existing prefix of a path that does not exist yet', () => {
      mkdirSync(join(testDir, 'real'));
      symlinkSync(join(testDir, 'real'), join(testDir, 'link'), 'dir');

      assert.strictEqual(
        canonicalPath(join(testDir, 'link', 'later', 'b.txt')),
        join(testDir, 'real', 'later', 'b.txt')
      );
    });

    it('applies .. after a symlink to the link destination', () => {
      mkdirSync(join(testDir, 'real', 'deep'), { recursive: true });
      writeTestFile(testDir, 'real/a.txt', 'real');
      writeTestFile(testDir, 'a.txt', 'decoy');
      symlinkSync(join(testDir, 'real', 'deep'), join(testDir, 'link'), 'dir');

      assert.strictEqual(canonicalPath(`${testDir}/link/../a.txt`), join(testDir, 'real', 'a.txt'));
    });

    it('applies .. after a symlink for paths that do not exist yet', () => {
      mkdirSync(join(testDir, 'real', 'deep'), { recursive: true });
      symlinkSync(join(testDir, 'real', 'deep'), join(testDir, 'link'), 'dir');

      assert.strictEqual(
        canonicalPath(`${testDir}/link/../later/b.txt`),
        join(testDir, 'real', 'later', 'b.txt')
      );
    });

    it('accepts paths below a regular file', () => {
      const file = writeTestFile(testDir, 'plain.txt', 'x');
      assert.strictEqual(canonicalPath(join(file, 'child')), join(testDir, 'plain.txt', 'child'));
    });
  });

  describe('rebasePath', () => {
    it('keeps the offset of a target inside the old parent', () => {
      assert.strictEqual(
        rebasePath('/dataviews-a/b/c/d.txt', '/dataviews-a/b', '/dataviews-x/y'),
        '/dataviews-x/y/c/d.txt'
      );
    });

    it('keeps the offset of a target outside the old parent', () => {
      assert.strictEqual(
        rebasePath('/dataviews-a/e.txt', '/dataviews-a/b', '/dataviews-x/y'),
        '/dataviews-x/e.txt'
      );
    });

    it('returns the target unchanged when the parents match', () => {
      const file = writeTestFile(testDir, 'a/b.txt', 'b');
      assert.strictEqual(rebasePath(file, testDir, testDir), file);
    });

    it('canonicalizes through symlinks in the new parent', () => {
      mkdirSync(join(testDir, 'real'));
      symlinkSync(join(testDir, 'real'), join(testDir, 'link'), 'dir');

      assert.strictEqual(
        rebasePath('/dataviews-old/data/x.csv', '/dataviews-old', join(testDir, 'link')),
        join(testDir, 'real', 'data', 'x.csv')
      );
    });

    it('applies a leading .. of the offset to the destination of a symlinked new parent', () => {
      mkdirSync(join(testDir, 'real', 'deep'), { recursive: true });
      symlinkSync(join(testDir, 'real', 'deep'), join(testDir, 'link'), 'dir');

      assert.strictEqual(
        rebasePath('/dataviews-old/a/x.csv', '/dataviews-old/a/b', join(testDir, 'link')),
        join(testDir, 'real', 'x.csv')
      );
    });
  });
});
