/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * dataviews relocate command - Rewrite a moved .view file for its new location
 */

import { dirname } from 'path';
import { some } from '@elaraai/east';
import type { ViewFile } from '@dataviews/types';
import {
  MissingSavedPathError,
  canonicalPath,
  viewFileRead,
  viewFileRebase,
  viewFileRoot,
  viewFileWrite,
} from '@dataviews/core';
import { formatError } from '../utils.js';

/**
 * A path target that was rebased
 */
export interface TargetChange {
  from: string;
  to: string;
}

/**
 * Relocate result
 */
export interface RelocateResult {
  success: boolean;
  /** Canonical path of the view file */
  location?: string;
  /** Location recorded in the file before relocating */
  savedPath?: string;
  /** Rebased targets, in node then target order */
  changes?: TargetChange[];
  error?: Error;
}

function pathTargets(file: ViewFile): string[] {
  return file.nodes.flatMap(node =>
    node.targets.flatMap(target => (target.type === 'path' ? [target.value] : []))
  );
}

/**
 * Core logic for relocating a view file.
 *
 * If the file's recorded location differs from where it is now, its path
 * targets are rebased from the recorded directory to the current one and the
 * file is rewritten with its new location. Files that have not moved are
 * left untouched.
 */
export async function relocateCore(filePath: string): Promise<RelocateResult> {
  try {
    const location = canonicalPath(filePath);
    const file = await viewFileRead(location);
    const saved = viewFileRoot(file).savedPath;
    if (saved.type === 'none') {
      throw new MissingSavedPathError(location);
    }
    if (saved.value === location) {
      return { success: true, location, savedPath: saved.value, changes: [] };
    }

    const rebased = viewFileRebase(file, dirname(saved.value), dirname(location));
    const rootIndex = Number(file.root);
    const updated: ViewFile = {
      root: rebased.root,
      nodes: rebased.nodes.map((node, i) => (i === rootIndex ? { ...node, savedPath: some(location) } : node)),
    };

    const before = pathTargets(file);
    const after = pathTargets(updated);
    const changes: TargetChange[] = [];
    before.forEach((from, i) => {
      const to = after[i];
      if (to !== undefined && to !== from) changes.push({ from, to });
    });

    await viewFileWrite(location, updated);
    return { success: true, location, savedPath: saved.value, changes };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(formatError(error)),
    };
  }
}
