import type { AnyContract, Contract } from '../contracts/contract.js';
import type { Implementation } from '../discovery/markers.js';
import { Registry } from './Registry.js';
import type { Factory, Lifecycle } from './types.js';

/**
 * The process-wide registry. It follows the same init-once contract as any other
 * `Registry`: it is never reset, and the first `register*` call initializes it without
 * discovery. Pass a `Registry` by reference instead where a module needs its own table.
 */
export const defaultRegistry = new Registry({ name: 'default' });

export function init(autoDiscover = true): void {
  defaultRegistry.init(autoDiscover);
}

export function register<T>(contract: Contract<T>, factory: Factory<T>, lifecycle?: Lifecycle): true {
  return defaultRegistry.register(contract, factory, lifecycle);
}

export function registerClass<T, C extends T>(contract: Contract<T>, impl: Implementation<C>, lifecycle?: Lifecycle): true {
  return defaultRegistry.registerClass(contract, impl, lifecycle);
}

export function registerInstance<T>(contract: Contract<T>, instance: T): true {
  return defaultRegistry.registerInstance(contract, instance);
}

export function resolve<T>(contract: Contract<T>): T {
  return defaultRegistry.resolve(contract);
}

export function isRegistered(contract: AnyContract): boolean {
  return defaultRegistry.isRegistered(contract);
}
