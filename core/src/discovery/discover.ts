import { missingMethods, type AnyContract } from '../contracts/contract.js';
import type { MarkerSource } from '../config/types.js';
import { AlreadyRegisteredError, ContractMismatchError } from '../registry/errors.js';
import { isImplementationMarker, type ImplementationMarker } from './markers.js';

// Accepts untyped iterables too, e.g. values gathered from module exports.
export function collectMarkers(
  source: MarkerSource | Iterable<unknown> | (() => Iterable<unknown>) | undefined,
): ImplementationMarker[] {
  if (!source) return [];
  const items = typeof source === 'function' ? source() : source;
  const out: ImplementationMarker[] = [];
  for (const item of items) {
    if (!isImplementationMarker(item)) throw new TypeError('Discovery source yielded a value that is not an implementation marker');
    out.push(item);
  }
  return out;
}

/**
 * Checks a whole batch before anything is registered: every marked class must carry
 * its contract's methods, and no contract may appear twice.
 */
export function checkMarkers(markers: ReadonlyArray<ImplementationMarker>): void {
  const seen = new Set<AnyContract>();
  for (const { contract, implementation } of markers) {
    const missing = missingMethods(contract, implementation.prototype);
    if (missing.length) throw new ContractMismatchError(contract, implementation.name, missing);
    if (seen.has(contract)) throw new AlreadyRegisteredError(contract);
    seen.add(contract);
  }
}
