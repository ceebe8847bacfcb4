/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Test helpers for CLI command testing
 *
 * Provides utilities for:
 * - Creating temporary test directories
 * - Building strategy registries for test views
 */

import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  StrategyRegistry,
  defineSimpleDerivation,
  type BoundDerivation,
} from '@dataviews/core';

/**
 * Create a temporary directory for CLI testing
 * @returns Canonical path to the directory
 */
export function createTestDir(): string {
  return realpathSync(mkdtempSync(join(tmpdir(), 'dataviews-cli-test-')));
}

/**
 * Remove a temporary test directory
 */
export function removeTestDir(testDir: string): void {
  rmSync(testDir, { recursive: true, force: true });
}

/** Derivations registered by {@link createTestRegistry} */
export interface TestDerivations {
  registry: StrategyRegistry;
  identity: BoundDerivation;
  upper: BoundDerivation<string>;
  concat: BoundDerivation<string>;
}

/**
 * Create a fresh registry with a few simple derivations
 */
export function createTestRegistry(): TestDerivations {
  const registry = new StrategyRegistry();
  return {
    registry,
    identity: defineSimpleDerivation('identity', input => input, registry),
    upper: defineSimpleDerivation('upper', text => String(text).toUpperCase(), registry),
    concat: defineSimpleDerivation('concat', (...inputs) => inputs.map(String).join(''), registry),
  };
}
