/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Domain error types for dataviews-core.
 *
 * All dataviews errors extend ViewError, allowing callers to catch all domain
 * errors with `if (err instanceof ViewError)` or specific errors with their
 * class. The exception is InvalidTargetError, which is a TypeError.
 *
 * Errors thrown by derivations and persisters are never wrapped.
 */

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all dataviews errors */
export class ViewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Target Errors
// =============================================================================

/**
 * Thrown when a view is constructed with a target that is neither a path
 * (string or `file:` URL) nor a view.
 */
export class InvalidTargetError extends TypeError {
  constructor(public readonly targetType: string) {
    super(`Got target type ${targetType}; expected string, file URL, or View`);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown by rebasing when a target carries an unknown kind. Construction
 * never produces such a target.
 */
export class InvalidTargetKindError extends ViewError {
  constructor(public readonly kind: string) {
    super(`Invalid target kind '${kind}'; expected 'path' or 'view'`);
  }
}

// =============================================================================
// Serialization Errors
// =============================================================================

/**
 * Thrown when loading a view file whose root view was never saved with
 * `View.save`, so there is no location to rebase from.
 */
export class MissingSavedPathError extends ViewError {
  constructor(public readonly path: string) {
    super(`View loaded from '${path}' has no recorded save location`);
  }
}

export class InvalidViewFileError extends ViewError {
  constructor(public readonly reason: string) {
    super(`Invalid view file: ${reason}`);
  }
}

// =============================================================================
// Strategy Errors
// =============================================================================

export type StrategyKind = 'derivation' | 'persister';

export class StrategyNotFoundError extends ViewError {
  constructor(
    public readonly kind: StrategyKind,
    public readonly strategy: string
  ) {
    super(`No ${kind} registered under '${strategy}'`);
  }
}

export class StrategyExistsError extends ViewError {
  constructor(
    public readonly kind: StrategyKind,
    public readonly strategy: string
  ) {
    super(`A ${kind} is already registered under '${strategy}'`);
  }
}

// =============================================================================
// Persistence Errors
// =============================================================================

/**
 * Thrown by the `json` persister for values JSON cannot represent. Nothing
 * is written.
 */
export class UnserializableValueError extends ViewError {
  constructor(
    public readonly valueType: string,
    public readonly key: string
  ) {
    super(
      key === ''
        ? `Cannot write ${valueType} as JSON`
        : `Cannot write ${valueType} as JSON (at key '${key}')`
    );
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Check if error is ENOTDIR (a path prefix is a file) */
export function isNotDirectoryError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOTDIR';
}
