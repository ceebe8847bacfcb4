/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * dataviews-types: Shared type definitions for dataviews
 *
 * This package defines the East types used for serializing views:
 * - Strategy references (derivations and persisters)
 * - Targets (paths and nested views)
 * - The view file itself
 *
 * Terminology:
 * - **View**: A lazy, serializable reference to derived data
 * - **Target**: A dependency of a view, either a file path or another view
 * - **Derivation**: The registered function computing a view from its targets
 * - **Persister**: The registered function writing a materialized value to disk
 */

export {
  StrategyRefType,
  type StrategyRef,
  TargetRefType,
  type TargetRefValue,
  ViewNodeType,
  type ViewNode,
  ViewFileType,
  type ViewFile,
  VIEW_EXTENSION,
} from './view.js';
