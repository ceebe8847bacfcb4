/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * dataviews relocate command - Rewrite a moved .view file for its new location
 *
 * Usage:
 *   dataviews relocate archive/sales.view
 */

import { relocateCore } from './relocate.impl.js';
import { exitError } from '../utils.js';

/**
 * CLI handler for the relocate command
 */
export async function relocateCommand(filePath: string): Promise<void> {
  const result = await relocateCore(filePath);

  if (!result.success) {
    exitError(`Failed to relocate ${filePath}: ${result.error?.message}`);
  }

  if (result.location === result.savedPath) {
    console.log(`${result.location} has not moved`);
    return;
  }

  console.log(`Relocated ${result.savedPath} -> ${result.location}`);
  for (const change of result.changes ?? []) {
    console.log(`  ${change.from} -> ${change.to}`);
  }
}
