/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for inspect command
 *
 * Testing strategy:
 * - Save view graphs with the core library, then inspect the files
 * - Use a fresh strategy registry per test
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { View, textPersister } from '@dataviews/core';
import { inspectCore } from './inspect.impl.js';
import { createTestDir, removeTestDir, createTestRegistry, type TestDerivations } from '../cli-test-helpers.js';

describe('inspect command', () => {
  let testDir: string;
  let strategies: TestDerivations;

  beforeEach(() => {
    testDir = createTestDir();
    strategies = createTestRegistry();
  });

  afterEach(() => {
    removeTestDir(testDir);
  });

  it('renders a single view with its targets', async () => {
    const view = new View([join(testDir, 'a.txt'), join(testDir, 'b.txt')], strategies.concat);
    await view.save(join(testDir, 'ab.view'));

    const result = await inspectCore(join(testDir, 'ab.view'));

    assert.strictEqual(result.success, true);
    assert.strictEqual(
      result.output,
      [
        `#0 concat (persister: json, saved: ${testDir}/ab.view)`,
        `├── ${testDir}/a.txt`,
        `└── ${testDir}/b.txt`,
      ].join('\n')
    );
  });

  it('renders nested views and references shared ones', async () => {
    const shared = new View(join(testDir, 'a.txt'), strategies.identity);
    const shouted = new View(shared, strategies.upper);
    const top = new View([shared, shouted, join(testDir, 'b.txt')], strategies.concat, textPersister);
    await top.save(join(testDir, 'top.view'));

    const result = await inspectCore(join(testDir, 'top.view'));

    assert.strictEqual(result.success, true);
    assert.strictEqual(
      result.output,
      [
        `#0 concat (persister: text, saved: ${testDir}/top.view)`,
        '├── #1 identity (persister: json)',
        `│   └── ${testDir}/a.txt`,
        '├── #2 upper (persister: json)',
        '│   └── (see #1)',
        `└── ${testDir}/b.txt`,
      ].join('\n')
    );
  });

  it('prints the decoded file as JSON', async () => {
    const view = new View(join(testDir, 'a.txt'), strategies.identity);
    await view.save(join(testDir, 'a.view'));

    const result = await inspectCore(join(testDir, 'a.view'), { json: true });

    assert.strictEqual(result.success, true);
    assert.ok(result.output?.includes(JSON.stringify(join(testDir, 'a.txt'))));
    assert.ok(result.output?.includes('"identity"'));
  });

  it('inspects files whose strategies are not registered', async () => {
    const view = new View(join(testDir, 'a.txt'), strategies.identity);
    await view.save(join(testDir, 'a.view'));

    const result = await inspectCore(join(testDir, 'a.view'));

    assert.strictEqual(result.success, true);
    assert.strictEqual(
      result.output,
      [`#0 identity (persister: json, saved: ${testDir}/a.view)`, `└── ${testDir}/a.txt`].join('\n')
    );
  });

  it('fails for a missing file', async () => {
    const result = await inspectCore(join(testDir, 'missing.view'));

    assert.strictEqual(result.success, false);
    assert.ok(result.error instanceof Error);
  });

  it('fails for a file that is not a view file', async () => {
    writeFileSync(join(testDir, 'empty.view'), '');

    const result = await inspectCore(join(testDir, 'empty.view'));

    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error?.name, 'InvalidViewFileError');
  });
});
