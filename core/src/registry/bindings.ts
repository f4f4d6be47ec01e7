import { hasContractChecks, missingMethods, satisfiesContract, type Contract } from '../contracts/contract.js';
import { ActivationError, ContractMismatchError, describeError } from './errors.js';
import type { Factory, Lifecycle } from './types.js';

export interface Binding<T> {
  readonly lifecycle: Lifecycle;
  readonly constructed: boolean;
  get(): T;
}

type LazySlot<T> = { state: 'unconstructed' } | { state: 'constructing' } | { state: 'constructed'; instance: T };

function implementationName(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Reflect.get(value, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
  }
  return typeof value;
}

export function checkInstance<T>(contract: Contract<T>, value: T): T {
  if (!hasContractChecks(contract) || satisfiesContract(contract, value)) return value;
  const missing = typeof value === 'object' && value !== null ? missingMethods(contract, value) : [];
  throw new ContractMismatchError(contract, implementationName(value), missing);
}

/**
 * Runs a factory and checks the result against the contract. Registry errors raised
 * inside the factory (e.g. resolving a missing dependency) are wrapped like any other.
 */
export function activate<T>(contract: Contract<T>, factory: Factory<T>): T {
  let value: T;
  try {
    value = factory();
  } catch (e) {
    throw new ActivationError(contract, describeError(e), e);
  }
  return checkInstance(contract, value);
}

export class EagerSingletonBinding<T> implements Binding<T> {
  readonly lifecycle = 'eager' as const;
  readonly constructed = true;
  private readonly instance: T;

  private constructor(instance: T) {
    this.instance = instance;
  }

  static fromInstance<T>(contract: Contract<T>, instance: T): EagerSingletonBinding<T> {
    return new EagerSingletonBinding(checkInstance(contract, instance));
  }

  static fromFactory<T>(contract: Contract<T>, factory: Factory<T>): EagerSingletonBinding<T> {
    return new EagerSingletonBinding(activate(contract, factory));
  }

  get(): T {
    return this.instance;
  }
}

export class LazySingletonBinding<T> implements Binding<T> {
  readonly lifecycle = 'lazy' as const;
  private slot: LazySlot<T> = { state: 'unconstructed' };

  constructor(
    private readonly contract: Contract<T>,
    private readonly factory: Factory<T>,
  ) {}

  get constructed(): boolean {
    return this.slot.state === 'constructed';
  }

  // unconstructed -> constructing -> constructed; a failed activation goes back to unconstructed.
  get(): T {
    const slot = this.slot;
    if (slot.state === 'constructed') return slot.instance;
    if (slot.state === 'constructing') {
      throw new ActivationError(this.contract, 're-entrant resolve while the instance is being constructed');
    }

    this.slot = { state: 'constructing' };
    let instance: T;
    try {
      instance = activate(this.contract, this.factory);
    } catch (e) {
      this.slot = { state: 'unconstructed' };
      throw e;
    }
    this.slot = { state: 'constructed', instance };
    return instance;
  }
}

export class FactoryBinding<T> implements Binding<T> {
  readonly lifecycle = 'factory' as const;
  readonly constructed = false;

  constructor(
    private readonly contract: Contract<T>,
    private readonly factory: Factory<T>,
  ) {}

  get(): T {
    return activate(this.contract, this.factory);
  }
}

export function createBinding<T>(contract: Contract<T>, factory: Factory<T>, lifecycle: Lifecycle): Binding<T> {
  switch (lifecycle) {
    case 'eager':
      return EagerSingletonBinding.fromFactory(contract, factory);
    case 'lazy':
      return new LazySingletonBinding(contract, factory);
    case 'factory':
      return new FactoryBinding(contract, factory);
    default:
      throw new TypeError(`Unknown lifecycle: ${String(lifecycle)}`);
  }
}
