import type { Contract } from '../contracts/contract.js';
import { isLifecycle, lifecycleFromFlags, type Lifecycle, type LifecycleFlags } from '../registry/types.js';

export const IMPLEMENTATION_MARKER: unique symbol = Symbol.for('depman.implementation');

export type Implementation<T> = new () => T;

export type ImplementationMarker<T = unknown> = {
  readonly [IMPLEMENTATION_MARKER]: true;
  readonly contract: Contract<T>;
  readonly implementation: Implementation<T>;
  readonly lifecycle: Lifecycle;
};

/**
 * Declares that `implementation` satisfies `contract`. Export the result from a module
 * (or hand it to a registry's `discovery` option) to have it registered on `init(true)`.
 *
 * Flags default to an eagerly constructed single instance.
 */
export function implementation<T, C extends T>(
  contract: Contract<T>,
  impl: Implementation<C>,
  flags: LifecycleFlags = {},
): ImplementationMarker<T> {
  return Object.freeze({
    [IMPLEMENTATION_MARKER]: true as const,
    contract,
    implementation: impl,
    lifecycle: lifecycleFromFlags(flags),
  });
}

export function isImplementationMarker(v: unknown): v is ImplementationMarker {
  if (!v || typeof v !== 'object') return false;
  if (Reflect.get(v, IMPLEMENTATION_MARKER) !== true) return false;
  const contract: unknown = Reflect.get(v, 'contract');
  return (
    typeof Reflect.get(v, 'implementation') === 'function' &&
    isLifecycle(Reflect.get(v, 'lifecycle')) &&
    !!contract &&
    typeof contract === 'object' &&
    typeof Reflect.get(contract, 'name') === 'string' &&
    Array.isArray(Reflect.get(contract, 'methods'))
  );
}
