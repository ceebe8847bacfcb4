/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * View file type definitions.
 *
 * A `.view` file is the beast2 encoding of a {@link ViewFile}: the definition
 * of a view graph (targets, derivation and persister references, saved
 * location), never its materialized value.
 *
 * Views may share nested views, so the graph is stored as a flat table of
 * nodes, and nested views are referenced by their index in that table.
 */

import {
  VariantType,
  StructType,
  ArrayType,
  StringType,
  IntegerType,
  BlobType,
  OptionType,
  type ValueTypeOf,
} from '@elaraai/east';

/**
 * Reference to a registered strategy (a derivation or a persister).
 *
 * @remarks
 * - `name`: Name the strategy is registered under
 * - `params`: beast2 encoding of the parameters the strategy was bound with,
 *   decoded with the strategy's own parameter type when the view is loaded
 *
 * @example
 * ```ts
 * const ref: StrategyRef = {
 *   name: 'read_text',
 *   params: encodeBeast2For(NullType)(null),
 * };
 * ```
 */
export const StrategyRefType = StructType({
  /** Registered strategy name */
  name: StringType,
  /** beast2-encoded strategy parameters */
  params: BlobType,
});
export type StrategyRefType = typeof StrategyRefType;

export type StrategyRef = ValueTypeOf<typeof StrategyRefType>;

/**
 * A single dependency of a view.
 *
 * @remarks
 * - `path`: Absolute canonical filesystem path
 * - `view`: Index of a nested view in {@link ViewFileType}'s `nodes`
 *
 * @example
 * ```ts
 * const file: TargetRefValue = variant('path', '/data/raw/sales.csv');
 * const nested: TargetRefValue = variant('view', 1n);
 * ```
 */
export const TargetRefType = VariantType({
  /** Absolute canonical path */
  path: StringType,
  /** Index of a nested view node */
  view: IntegerType,
});
export type TargetRefType = typeof TargetRefType;

export type TargetRefValue = ValueTypeOf<typeof TargetRefType>;

/**
 * One view in the serialized graph.
 */
export const ViewNodeType = StructType({
  /** Ordered targets, passed to the derivation in this order */
  targets: ArrayType(TargetRefType),
  /** Derivation that computes the view's value from its targets */
  derivation: StrategyRefType,
  /** Persister used when the view is solidified */
  persister: StrategyRefType,
  /** Where this view was last saved, if it ever was */
  savedPath: OptionType(StringType),
});
export type ViewNodeType = typeof ViewNodeType;

export type ViewNode = ValueTypeOf<typeof ViewNodeType>;

/**
 * Contents of a `.view` file.
 *
 * Nodes are listed in first-visit order from the root, so a view shared by
 * several parents appears once.
 */
export const ViewFileType = StructType({
  /** All views of the graph */
  nodes: ArrayType(ViewNodeType),
  /** Index of the root view in `nodes` */
  root: IntegerType,
});
export type ViewFileType = typeof ViewFileType;

export type ViewFile = ValueTypeOf<typeof ViewFileType>;

/** Conventional extension of a saved view */
export const VIEW_EXTENSION = '.view';
