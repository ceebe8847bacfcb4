/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for dataviews-core
 * Provides utilities for setting up and tearing down test directories
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Creates a temporary directory for testing
 * @returns Canonical path to temporary directory
 */
export function createTempDir(): string {
  return realpathSync(mkdtempSync(join(tmpdir(), 'dataviews-test-')));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file below `dir`, creating parent directories
 * @returns Path to the written file
 */
export function writeTestFile(dir: string, relativePath: string, content: string): string {
  const filePath = join(dir, relativePath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}
