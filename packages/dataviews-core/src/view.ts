/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Views: lazy, serializable references to derived data.
 *
 * A view names one or more targets (files or other views) and a derivation.
 * Materializing the view resolves its targets in order, applies the
 * derivation, and caches the result in memory. The view's definition can be
 * saved to a `.view` file independently of its value, and reloaded after the
 * file and its targets have moved, as long as their relative layout is kept.
 *
 * Views form a tree or DAG: targets are fixed at construction, so a view
 * can only depend on views that already exist.
 */

import { fileURLToPath } from 'url';
import * as path from 'path';
import type { Writable } from 'stream';
import { none, some, variant } from '@elaraai/east';
import { VIEW_EXTENSION, type ViewFile } from '@dataviews/types';
import {
  viewFileDecode,
  viewFileEncode,
  viewFileRead,
  writeAtomic,
} from './codec.js';
import {
  InvalidTargetError,
  InvalidTargetKindError,
  InvalidViewFileError,
  MissingSavedPathError,
} from './errors.js';
import { canonicalPath, rebasePath } from './paths.js';
import {
  defaultRegistry,
  jsonPersister,
  type BoundDerivation,
  type BoundPersister,
  type StrategyRegistry,
} from './strategies.js';

// =============================================================================
// Types
// =============================================================================

/** What a view accepts as a target */
export type TargetInput = string | URL | View;

/** A normalized target */
export type TargetRef =
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'view'; readonly view: View };

/** Options for loading views */
export interface ViewLoadOptions {
  /** Registry to resolve derivations and persisters from (default: defaultRegistry) */
  registry?: StrategyRegistry;
}

type CacheSlot<T> =
  | { readonly state: 'empty' }
  | { readonly state: 'pending'; readonly promise: Promise<T> }
  | { readonly state: 'populated'; readonly value: T };

const EMPTY: CacheSlot<never> = { state: 'empty' };

// =============================================================================
// Target Validation
// =============================================================================

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/**
 * Validate and normalize a single target.
 *
 * Views pass through unchanged. Strings and `file:` URLs are resolved to
 * absolute canonical paths.
 *
 * @throws {InvalidTargetError} For any other value
 */
export function toTargetRef(value: unknown): TargetRef {
  if (value instanceof View) {
    return { kind: 'view', view: value };
  }
  if (typeof value === 'string') {
    return { kind: 'path', path: canonicalPath(value) };
  }
  if (value instanceof URL && value.protocol === 'file:') {
    return { kind: 'path', path: canonicalPath(fileURLToPath(value)) };
  }
  throw new InvalidTargetError(describeType(value));
}

function describeKind(target: never): string {
  const value: unknown = target;
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return describeType(value);
}

// =============================================================================
// View
// =============================================================================

/**
 * An unmaterialized view of a piece of data: a set of dependencies and the
 * logic needed to derive the data from them.
 *
 * @typeParam T - Type of the materialized value
 *
 * @example
 * ```ts
 * const readText = defineSimpleDerivation('read_text', file => readFile(String(file), 'utf-8'));
 * const countLines = defineSimpleDerivation('count_lines', text => String(text).split('\n').length);
 *
 * const text = new View('notes.txt', readText);
 * const lines = new View(text, countLines);
 *
 * await lines.materialize(); // reads notes.txt once, then counts
 * await lines.save('lines.view');
 *
 * const reloaded = await View.fromPath('lines.view');
 * ```
 */
export class View<T = unknown> {
  private readonly refs: TargetRef[];
  private cache: CacheSlot<T> = EMPTY;
  private location: string | null = null;

  /**
   * @param targets - A single target or an array of targets
   * @param derivation - Computes the value from the materialized targets
   * @param persister - Writes the value when the view is solidified
   * @throws {InvalidTargetError} If a target is not a string, file URL or view
   */
  constructor(
    targets: TargetInput | readonly TargetInput[],
    public readonly derivation: BoundDerivation<T>,
    public readonly persister: BoundPersister = jsonPersister
  ) {
    const inputs: readonly unknown[] = Array.isArray(targets) ? targets : [targets];
    this.refs = inputs.map(toTargetRef);
  }

  /**
   * Rebuild a view from already normalized parts, without touching the
   * filesystem.
   *
   * Unchecked: targets are taken as given, so paths are not canonicalized
   * and target kinds are not validated. Use the constructor for
   * caller-supplied targets.
   * @internal
   */
  static restore(
    targets: TargetRef[],
    derivation: BoundDerivation,
    persister: BoundPersister,
    savedPath: string | null
  ): View {
    const view = new View([], derivation, persister);
    view.refs.push(...targets);
    view.location = savedPath;
    return view;
  }

  /** Ordered targets */
  get targets(): readonly TargetRef[] {
    return this.refs;
  }

  /** Absolute path this view was last saved to or loaded from, if any */
  get savedPath(): string | null {
    return this.location;
  }

  /** Whether a materialized value is cached */
  get isMaterialized(): boolean {
    return this.cache.state === 'populated';
  }

  /** Drop the cached value, if any */
  clearCache(): void {
    this.cache = EMPTY;
  }

  /**
   * All distinct views of this view's graph, this view first, then nested
   * views in first-visit order.
   */
  views(): View[] {
    const seen = new Set<View>();
    const order: View[] = [];
    const visit = (view: View): void => {
      if (seen.has(view)) return;
      seen.add(view);
      order.push(view);
      for (const target of view.refs) {
        if (target.kind === 'view') visit(target.view);
      }
    };
    visit(this);
    return order;
  }

  // ===========================================================================
  // Materialization
  // ===========================================================================

  /**
   * Recursively materialize the view.
   *
   * The derivation runs at most once per instance: later calls return the
   * cached value, even if the target files have changed since. Concurrent
   * calls share the same pending result. If the derivation or a nested view
   * fails, the error propagates and nothing is cached, so the call can be
   * retried.
   *
   * Clearing the cache (directly, or through `dumps` or `save`) while a
   * materialization is pending detaches it: the pending call still resolves
   * for its callers, but its value is not cached and the next call derives
   * again.
   */
  materialize(): Promise<T> {
    const current = this.cache;
    if (current.state === 'populated') return Promise.resolve(current.value);
    if (current.state === 'pending') return current.promise;

    const promise = this.derive().then(
      value => {
        if (this.cache === slot) this.cache = { state: 'populated', value };
        return value;
      },
      (err: unknown) => {
        if (this.cache === slot) this.cache = EMPTY;
        throw err;
      }
    );
    const slot: CacheSlot<T> = { state: 'pending', promise };
    this.cache = slot;
    return promise;
  }

  private async derive(): Promise<T> {
    const inputs: unknown[] = [];
    for (const target of this.refs) {
      inputs.push(target.kind === 'view' ? await target.view.materialize() : target.path);
    }
    return this.derivation.apply(...inputs);
  }

  // ===========================================================================
  // Rebasing
  // ===========================================================================

  /**
   * Recursively rebase target paths from `oldParent` to `newParent`.
   *
   * Nested views are rebased in place, and each view of the graph is rebased
   * once even if several views share it.
   *
   * @throws {InvalidTargetKindError} If a target has an unknown kind
   */
  rebaseTargets(oldParent: string, newParent: string): void {
    for (const view of this.views()) {
      view.rebaseOwnTargets(oldParent, newParent);
    }
  }

  private rebaseOwnTargets(oldParent: string, newParent: string): void {
    this.refs.forEach((target, i) => {
      switch (target.kind) {
        case 'path':
          this.refs[i] = { kind: 'path', path: rebasePath(target.path, oldParent, newParent) };
          break;
        case 'view':
          break;
        default:
          throw new InvalidTargetKindError(describeKind(target));
      }
    });
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Serialize the (unmaterialized) view graph to beast2.
   *
   * Clears the cache of every view in the graph.
   */
  dumps(): Uint8Array {
    const views = this.views();
    for (const view of views) view.clearCache();
    return viewFileEncode(toViewFile(views));
  }

  /**
   * Write the (unmaterialized) view graph to an open stream. The stream is
   * left open.
   */
  async dump(stream: Writable): Promise<void> {
    const data = this.dumps();
    await new Promise<void>((resolve, reject) => {
      stream.write(data, err => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Save the (unmaterialized) view to a file and record its location.
   *
   * Warns if the path does not end in `.view`; the file is written anyway.
   *
   * @param filePath - Destination, conventionally ending in `.view`
   */
  async save(filePath: string): Promise<void> {
    const location = canonicalPath(filePath);
    this.location = location;
    if (path.extname(location) !== VIEW_EXTENSION) {
      console.warn(`A ${VIEW_EXTENSION} extension is recommended for view files: '${location}'`);
    }
    await writeAtomic(location, this.dumps());
  }

  /**
   * Load a view from a file.
   *
   * If the file has moved since it was saved, target paths are rebased from
   * the saved directory to the current one. Relative paths from the view
   * file to its targets are expected to be preserved.
   *
   * @throws {MissingSavedPathError} If the view was not written by `save`
   * @throws {StrategyNotFoundError} If a derivation or persister is not registered
   */
  static async fromPath(filePath: string, options: ViewLoadOptions = {}): Promise<View> {
    const location = canonicalPath(filePath);
    const view = fromViewFile(await viewFileRead(location), options.registry ?? defaultRegistry);
    const saved = view.location;
    if (saved === null) {
      throw new MissingSavedPathError(location);
    }
    if (saved !== location) {
      view.rebaseTargets(path.dirname(saved), path.dirname(location));
    }
    view.location = location;
    return view;
  }

  /**
   * Load a view from bytes produced by `dumps`. The loaded view has no saved
   * location.
   *
   * @throws {StrategyNotFoundError} If a derivation or persister is not registered
   */
  static fromBytes(data: Uint8Array, options: ViewLoadOptions = {}): View {
    const view = fromViewFile(viewFileDecode(data), options.registry ?? defaultRegistry);
    view.location = null;
    return view;
  }

  // ===========================================================================
  // Solidify
  // ===========================================================================

  /**
   * Materialize the view and write the value (not the view) with the view's
   * persister.
   *
   * @param destination - Where the persister writes the value
   */
  async solidify(destination: string): Promise<void> {
    const value = await this.materialize();
    await this.persister.apply(value, path.resolve(destination));
  }
}

// =============================================================================
// Graph Conversion
// =============================================================================

/**
 * Convert a view graph to its file structure. `views` lists the graph in
 * first-visit order, root first.
 */
function toViewFile(views: View[]): ViewFile {
  const index = new Map(views.map((view, i) => [view, BigInt(i)]));
  const indexOf = (view: View): bigint => {
    const i = index.get(view);
    if (i === undefined) {
      throw new InvalidViewFileError('nested view missing from graph');
    }
    return i;
  };

  return {
    root: 0n,
    nodes: views.map(view => ({
      targets: view.targets.map(target =>
        target.kind === 'path' ? variant('path', target.path) : variant('view', indexOf(target.view))
      ),
      derivation: { name: view.derivation.name, params: view.derivation.params },
      persister: { name: view.persister.name, params: view.persister.params },
      savedPath: view.savedPath === null ? none : some(view.savedPath),
    })),
  };
}

/**
 * Rebuild a view graph from its file structure, resolving strategies from
 * `registry`. Nodes referenced several times become one shared view.
 *
 * @throws {InvalidViewFileError} For out-of-range indices or cyclic nodes
 */
function fromViewFile(file: ViewFile, registry: StrategyRegistry): View {
  const built = new Map<number, View>();
  const building = new Set<number>();

  const build = (index: number): View => {
    const existing = built.get(index);
    if (existing !== undefined) return existing;
    if (building.has(index)) {
      throw new InvalidViewFileError(`node ${index} depends on itself`);
    }
    const node = file.nodes[index];
    if (node === undefined) {
      throw new InvalidViewFileError(`node index ${index} out of range (${file.nodes.length} nodes)`);
    }

    building.add(index);
    const targets = node.targets.map((target): TargetRef =>
      target.type === 'path'
        ? { kind: 'path', path: target.value }
        : { kind: 'view', view: build(Number(target.value)) }
    );
    const view = View.restore(
      targets,
      registry.resolveDerivation(node.derivation.name, node.derivation.params),
      registry.resolvePersister(node.persister.name, node.persister.params),
      node.savedPath.type === 'some' ? node.savedPath.value : null
    );
    building.delete(index);
    built.set(index, view);
    return view;
  };

  return build(Number(file.root));
}
