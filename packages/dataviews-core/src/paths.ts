/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Path canonicalization and rebasing.
 *
 * Targets are stored as absolute canonical paths. A path is canonical when
 * it is absolute and contains no `.`, `..` or symlinked segments. As with
 * realpath(3), a `..` following a symlink refers to the parent of the link's
 * destination. Paths that do not exist yet are still accepted: the longest
 * existing prefix is resolved through the filesystem and the remaining
 * segments are appended.
 */

import { realpathSync } from 'fs';
import * as path from 'path';
import { isNotDirectoryError, isNotFoundError } from './errors.js';

/**
 * Resolve a path to its absolute canonical form.
 *
 * @param target - Absolute or relative (to the working directory) path
 * @returns Absolute path with symlinks, `.` and `..` eliminated
 *
 * @example
 * ```ts
 * canonicalPath('data/../raw/a.csv'); // '/home/me/project/raw/a.csv'
 * ```
 */
export function canonicalPath(target: string): string {
  const missing: string[] = [];
  let existing = path.isAbsolute(target) ? target : `${process.cwd()}${path.sep}${target}`;

  while (true) {
    try {
      const real = realpathSync.native(existing);
      return missing.length === 0 ? real : path.join(real, ...missing.reverse());
    } catch (err) {
      if (!isNotFoundError(err) && !isNotDirectoryError(err)) {
        throw err;
      }
    }
    // Raw segments: a `..` after a symlink is left to realpath
    const cut = existing.lastIndexOf(path.sep);
    if (cut < 0 || existing === path.sep) {
      return path.resolve(target);
    }
    missing.push(existing.slice(cut + 1));
    existing = cut === 0 ? path.sep : existing.slice(0, cut);
  }
}

/**
 * Move a path so that its position relative to `newParent` matches its
 * position relative to `oldParent`.
 *
 * The target does not need to lie inside `oldParent`; its offset may start
 * with `..` segments. If the target was never correct relative to
 * `oldParent`, the result is a valid but wrong path.
 *
 * @param target - Absolute path to move
 * @param oldParent - Directory the offset is computed from
 * @param newParent - Directory the offset is applied to
 * @returns Absolute canonical path
 *
 * @example
 * ```ts
 * rebasePath('/a/b/c/d.txt', '/a/b', '/x/y'); // '/x/y/c/d.txt'
 * rebasePath('/a/e.txt', '/a/b', '/x/y');     // '/x/e.txt'
 * ```
 */
export function rebasePath(target: string, oldParent: string, newParent: string): string {
  const offset = path.relative(oldParent, target);
  return canonicalPath(offset === '' ? newParent : `${newParent}${path.sep}${offset}`);
}
