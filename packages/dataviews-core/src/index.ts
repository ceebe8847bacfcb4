/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * dataviews Core - Lazy, serializable views of derived data
 *
 * This package provides the View class and the machinery around it:
 * target normalization, rebasing, strategy registries and view files.
 * It has no UI dependencies and can be used programmatically.
 */

// Views
export {
  View,
  toTargetRef,
  type TargetInput,
  type TargetRef,
  type ViewLoadOptions,
} from './view.js';

// Strategies
export {
  StrategyRegistry,
  defaultRegistry,
  defineDerivation,
  defineSimpleDerivation,
  definePersister,
  defineSimplePersister,
  jsonPersister,
  textPersister,
  type Bound,
  type BoundDerivation,
  type BoundPersister,
  type DeriveFn,
  type PersistFn,
  type Strategy,
} from './strategies.js';

// View files
export {
  viewFileEncode,
  viewFileDecode,
  viewFileRead,
  viewFileWrite,
  viewFileRoot,
  viewFileRebase,
} from './codec.js';

// Paths
export { canonicalPath, rebasePath } from './paths.js';

// Errors
export {
  ViewError,
  InvalidTargetError,
  InvalidTargetKindError,
  MissingSavedPathError,
  InvalidViewFileError,
  StrategyNotFoundError,
  StrategyExistsError,
  UnserializableValueError,
  type StrategyKind,
  isNotFoundError,
  isNotDirectoryError,
} from './errors.js';
