/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * dataviews inspect command - Show the view graph stored in a .view file
 *
 * Usage:
 *   dataviews inspect sales.view          # Tree of views and targets
 *   dataviews inspect sales.view --json   # Decoded file as JSON
 */

import { inspectCore, type InspectOptions } from './inspect.impl.js';
import { exitError } from '../utils.js';

/**
 * CLI handler for the inspect command
 */
export async function inspectCommand(filePath: string, options: InspectOptions): Promise<void> {
  const result = await inspectCore(filePath, options);

  if (!result.success) {
    exitError(`Failed to inspect ${filePath}: ${result.error?.message}`);
  }

  console.log(result.output);
}
