/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Named, registry-resolved strategies for deriving and persisting views.
 *
 * A view file cannot hold a JavaScript closure. Instead, a view stores the
 * name of a registered strategy and the beast2-encoded parameters it was
 * bound with; loading the view looks the name up in a {@link StrategyRegistry}
 * and rebuilds the function from the decoded parameters. Anything a closure
 * would have captured belongs in the parameters.
 *
 * @example
 * ```ts
 * import { StructType, StringType } from '@elaraai/east';
 *
 * const readLines = defineDerivation(
 *   'read_lines',
 *   StructType({ encoding: StringType }),
 *   ({ encoding }) => async (file) => (await readFile(String(file), encoding)).split('\n'),
 * );
 *
 * const view = new View('data/input.txt', readLines({ encoding: 'utf-8' }));
 * ```
 */

import * as fs from 'fs/promises';
import { decodeBeast2For, encodeBeast2For, NullType } from '@elaraai/east';
import type { EastType, ValueTypeOf } from '@elaraai/east';
import {
  StrategyExistsError,
  StrategyNotFoundError,
  UnserializableValueError,
  type StrategyKind,
} from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Computes a view's value from its materialized targets, one argument per
 * target in declaration order. Path targets arrive as absolute path strings,
 * nested views as their materialized values.
 */
export type DeriveFn<T = unknown> = (...inputs: unknown[]) => T | Promise<T>;

/** Writes a materialized value to `destination` */
export type PersistFn = (value: unknown, destination: string) => void | Promise<void>;

/**
 * A strategy function together with the reference that reproduces it.
 */
export interface Bound<F> {
  /** Registered strategy name */
  readonly name: string;
  /** beast2-encoded parameters */
  readonly params: Uint8Array;
  /** The function built from the parameters */
  readonly apply: F;
}

export type BoundDerivation<T = unknown> = Bound<DeriveFn<T>>;

export type BoundPersister = Bound<PersistFn>;

/**
 * A named factory of strategy functions, parameterized by an East type.
 */
export interface Strategy<P extends EastType, F> {
  readonly name: string;
  readonly paramsType: P;
  readonly create: (params: ValueTypeOf<P>) => F;
}

/** A registered strategy with its parameter type erased */
interface Registration<F> {
  readonly resolve: (params: Uint8Array) => F;
}

// =============================================================================
// Built-in Persisters
// =============================================================================

const encodeNull = encodeBeast2For(NullType);

function jsonReplacer(key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      throw new UnserializableValueError(typeof value, key);
    default:
      if (value instanceof Map || value instanceof Set) {
        throw new UnserializableValueError(value.constructor.name, key);
      }
      return value;
  }
}

async function writeJson(value: unknown, destination: string): Promise<void> {
  const text = JSON.stringify(value, jsonReplacer, 2);
  await fs.writeFile(destination, text, 'utf-8');
}

async function writeText(value: unknown, destination: string): Promise<void> {
  await fs.writeFile(destination, String(value), 'utf-8');
}

/**
 * Default persister: pretty-printed JSON, bigints written as decimal strings.
 *
 * @throws {UnserializableValueError} For `undefined`, functions, symbols,
 * Maps and Sets anywhere in the value
 */
export const jsonPersister: BoundPersister = {
  name: 'json',
  params: encodeNull(null),
  apply: writeJson,
};

/** Writes `String(value)` as UTF-8 text */
export const textPersister: BoundPersister = {
  name: 'text',
  params: encodeNull(null),
  apply: writeText,
};

// =============================================================================
// Registry
// =============================================================================

function registration<P extends EastType, F>(strategy: Strategy<P, F>): Registration<F> {
  const decode = decodeBeast2For(strategy.paramsType);
  return { resolve: params => strategy.create(decode(params)) };
}

/**
 * Strategies available when loading views, by name.
 *
 * Derivations and persisters live in separate namespaces. Every registry
 * starts with the built-in `json` and `text` persisters.
 */
export class StrategyRegistry {
  private readonly derivations = new Map<string, Registration<DeriveFn>>();
  private readonly persisters = new Map<string, Registration<PersistFn>>();

  constructor() {
    this.registerPersister({ name: jsonPersister.name, paramsType: NullType, create: () => writeJson });
    this.registerPersister({ name: textPersister.name, paramsType: NullType, create: () => writeText });
  }

  registerDerivation<P extends EastType>(strategy: Strategy<P, DeriveFn>): void {
    this.register('derivation', this.derivations, strategy);
  }

  registerPersister<P extends EastType>(strategy: Strategy<P, PersistFn>): void {
    this.register('persister', this.persisters, strategy);
  }

  hasDerivation(name: string): boolean {
    return this.derivations.has(name);
  }

  hasPersister(name: string): boolean {
    return this.persisters.has(name);
  }

  /**
   * Rebuild a derivation from its stored reference.
   *
   * @throws {StrategyNotFoundError} If no derivation is registered under `name`
   */
  resolveDerivation(name: string, params: Uint8Array): BoundDerivation {
    return { name, params, apply: this.lookup('derivation', this.derivations, name).resolve(params) };
  }

  /**
   * Rebuild a persister from its stored reference.
   *
   * @throws {StrategyNotFoundError} If no persister is registered under `name`
   */
  resolvePersister(name: string, params: Uint8Array): BoundPersister {
    return { name, params, apply: this.lookup('persister', this.persisters, name).resolve(params) };
  }

  private register<P extends EastType, F>(
    kind: StrategyKind,
    table: Map<string, Registration<F>>,
    strategy: Strategy<P, F>
  ): void {
    if (table.has(strategy.name)) {
      throw new StrategyExistsError(kind, strategy.name);
    }
    table.set(strategy.name, registration(strategy));
  }

  private lookup<F>(kind: StrategyKind, table: Map<string, Registration<F>>, name: string): Registration<F> {
    const entry = table.get(name);
    if (entry === undefined) {
      throw new StrategyNotFoundError(kind, name);
    }
    return entry;
  }
}

/** Registry used when none is given */
export const defaultRegistry = new StrategyRegistry();

// =============================================================================
// Definition Helpers
// =============================================================================

/**
 * Register a parameterized derivation and return a function that binds it.
 *
 * @param name - Unique derivation name, stored in view files
 * @param paramsType - East type of the parameters
 * @param create - Builds the derivation function from its parameters
 * @param registry - Registry to add the strategy to
 * @returns Binder producing a {@link BoundDerivation} for given parameters
 */
export function defineDerivation<P extends EastType, T>(
  name: string,
  paramsType: P,
  create: (params: ValueTypeOf<P>) => DeriveFn<T>,
  registry: StrategyRegistry = defaultRegistry
): (params: ValueTypeOf<P>) => BoundDerivation<T> {
  registry.registerDerivation({ name, paramsType, create });
  const encode = encodeBeast2For(paramsType);
  return params => ({ name, params: encode(params), apply: create(params) });
}

/**
 * Register a derivation that takes no parameters.
 *
 * @returns The bound derivation, ready to pass to a view
 */
export function defineSimpleDerivation<T>(
  name: string,
  fn: DeriveFn<T>,
  registry: StrategyRegistry = defaultRegistry
): BoundDerivation<T> {
  return defineDerivation(name, NullType, () => fn, registry)(null);
}

/**
 * Register a parameterized persister and return a function that binds it.
 */
export function definePersister<P extends EastType>(
  name: string,
  paramsType: P,
  create: (params: ValueTypeOf<P>) => PersistFn,
  registry: StrategyRegistry = defaultRegistry
): (params: ValueTypeOf<P>) => BoundPersister {
  registry.registerPersister({ name, paramsType, create });
  const encode = encodeBeast2For(paramsType);
  return params => ({ name, params: encode(params), apply: create(params) });
}

/**
 * Register a persister that takes no parameters.
 */
export function defineSimplePersister(
  name: string,
  fn: PersistFn,
  registry: StrategyRegistry = defaultRegistry
): BoundPersister {
  return definePersister(name, NullType, () => fn, registry)(null);
}
