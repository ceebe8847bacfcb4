/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Reading and writing view files.
 *
 * These functions work on the decoded {@link ViewFile} structure and never
 * resolve strategies, so they can inspect or relocate a view file without
 * the code that defined its derivations.
 *
 * Writes are atomic using stage-and-rename pattern:
 * 1. Write to a temporary .partial file
 * 2. Rename to final destination (atomic on POSIX filesystems)
 */

import * as fs from 'fs/promises';
import { decodeBeast2For, encodeBeast2For, variant } from '@elaraai/east';
import { ViewFileType, type ViewFile, type ViewNode } from '@dataviews/types';
import { InvalidViewFileError } from './errors.js';
import { rebasePath } from './paths.js';

const encodeViewFile = encodeBeast2For(ViewFileType);
const decodeViewFile = decodeBeast2For(ViewFileType);

/**
 * Encode a view file to beast2.
 */
export function viewFileEncode(file: ViewFile): Uint8Array {
  return encodeViewFile(file);
}

/**
 * Decode a view file from beast2.
 *
 * @throws {InvalidViewFileError} If the data is not a beast2-encoded view file
 */
export function viewFileDecode(data: Uint8Array): ViewFile {
  try {
    return decodeViewFile(data);
  } catch (err) {
    throw new InvalidViewFileError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Read and decode a view file.
 *
 * @param filePath - Path to a `.view` file
 */
export async function viewFileRead(filePath: string): Promise<ViewFile> {
  const data = await fs.readFile(filePath);
  return viewFileDecode(data);
}

/**
 * Encode and atomically write a view file.
 */
export async function viewFileWrite(filePath: string, file: ViewFile): Promise<void> {
  await writeAtomic(filePath, viewFileEncode(file));
}

/**
 * Atomically write bytes to a file.
 * @internal
 */
export async function writeAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const partialPath = `${filePath}.partial`;
  try {
    await fs.writeFile(partialPath, data);
    await fs.rename(partialPath, filePath);
  } catch (err) {
    await fs.rm(partialPath, { force: true });
    throw err;
  }
}

/**
 * Get the root node of a view file.
 *
 * @throws {InvalidViewFileError} If the root index is out of range
 */
export function viewFileRoot(file: ViewFile): ViewNode {
  const root = file.nodes[Number(file.root)];
  if (root === undefined) {
    throw new InvalidViewFileError(`root index ${file.root} out of range (${file.nodes.length} nodes)`);
  }
  return root;
}

/**
 * Rebase every path target of a view file.
 *
 * Each node is listed once, so shared views are rebased once. Saved paths
 * are left as they are.
 *
 * @param file - Decoded view file
 * @param oldParent - Directory the targets are currently relative to
 * @param newParent - Directory they should be relative to
 * @returns A new view file with rebased targets
 */
export function viewFileRebase(file: ViewFile, oldParent: string, newParent: string): ViewFile {
  return {
    root: file.root,
    nodes: file.nodes.map(node => ({
      ...node,
      targets: node.targets.map(target =>
        target.type === 'path'
          ? variant('path', rebasePath(target.value, oldParent, newParent))
          : target
      ),
    })),
  };
}
