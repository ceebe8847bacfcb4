/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * dataviews inspect command - Show the view graph stored in a .view file
 */

import { toJSONFor } from '@elaraai/east';
import { ViewFileType, type TargetRefValue, type ViewFile, type ViewNode } from '@dataviews/types';
import { InvalidViewFileError, canonicalPath, viewFileRead, viewFileRoot } from '@dataviews/core';
import { formatError } from '../utils.js';

const viewFileToJSON = toJSONFor(ViewFileType);

/**
 * Inspect options
 */
export interface InspectOptions {
  /** Print the decoded file as JSON instead of a tree */
  json?: boolean;
}

/**
 * Inspect result
 */
export interface InspectResult {
  success: boolean;
  output?: string;
  error?: Error;
}

function nodeAt(file: ViewFile, index: number): ViewNode {
  const node = file.nodes[index];
  if (node === undefined) {
    throw new InvalidViewFileError(`node index ${index} out of range (${file.nodes.length} nodes)`);
  }
  return node;
}

/**
 * Label of a view node: index, derivation, persister and saved location.
 */
export function formatNode(node: ViewNode, index: number): string {
  const details = [`persister: ${node.persister.name}`];
  if (node.savedPath.type === 'some') {
    details.push(`saved: ${node.savedPath.value}`);
  }
  return `#${index} ${node.derivation.name} (${details.join(', ')})`;
}

/**
 * Render targets with box-drawing characters. Views already rendered are
 * referenced by index instead of repeated.
 */
function renderTargets(
  file: ViewFile,
  targets: TargetRefValue[],
  prefix: string,
  seen: Set<number>
): string[] {
  const lines: string[] = [];

  for (let i = 0; i < targets.length; i++) {
    const target = targets[i]!;
    const isLast = i === targets.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    if (target.type === 'path') {
      lines.push(prefix + connector + target.value);
      continue;
    }

    const index = Number(target.value);
    if (seen.has(index)) {
      lines.push(prefix + connector + `(see #${index})`);
      continue;
    }
    seen.add(index);
    const node = nodeAt(file, index);
    lines.push(prefix + connector + formatNode(node, index));
    lines.push(...renderTargets(file, node.targets, prefix + childPrefix, seen));
  }

  return lines;
}

/**
 * Render a view file as a tree, root first.
 */
export function renderViewFile(file: ViewFile): string[] {
  const root = viewFileRoot(file);
  const rootIndex = Number(file.root);
  return [formatNode(root, rootIndex), ...renderTargets(file, root.targets, '', new Set([rootIndex]))];
}

/**
 * Core logic for inspecting a view file. Strategies are not resolved, so
 * any view file can be inspected.
 */
export async function inspectCore(filePath: string, options: InspectOptions = {}): Promise<InspectResult> {
  try {
    const file = await viewFileRead(canonicalPath(filePath));
    const output = options.json
      ? JSON.stringify(viewFileToJSON(file), null, 2)
      : renderViewFile(file).join('\n');
    return { success: true, output };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(formatError(error)),
    };
  }
}
