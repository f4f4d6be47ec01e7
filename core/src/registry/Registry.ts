import type { AnyContract, Contract } from '../contracts/contract.js';
import type { MarkerSource, RegistryOptions } from '../config/types.js';
import { checkMarkers, collectMarkers } from '../discovery/discover.js';
import type { Implementation } from '../discovery/markers.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { EagerSingletonBinding, createBinding, type Binding } from './bindings.js';
import {
  ActivationError,
  AlreadyInitializedError,
  AlreadyRegisteredError,
  NotInitializedError,
  NotRegisteredError,
  RegistryError,
  describeError,
} from './errors.js';
import type { Factory, Lifecycle } from './types.js';

/**
 * Contract -> binding lookup table with an init-once lifecycle.
 *
 * Every operation is synchronous and never yields to the event loop, so the
 * check-and-set in `init` and the check-then-insert in `register` cannot interleave
 * with another caller. A losing `register` always throws `AlreadyRegisteredError`.
 */
export class Registry {
  readonly name: string;
  private readonly logger: Logger;
  private readonly discovery: MarkerSource | undefined;
  private bindings: Map<AnyContract, Binding<unknown>> | null = null;

  constructor(opts: RegistryOptions = {}) {
    this.name = opts.name ?? 'default';
    this.logger = opts.logger ?? silentLogger;
    this.discovery = opts.discovery;
  }

  get initialized(): boolean {
    return this.bindings !== null;
  }

  /**
   * Creates the binding table. With `autoDiscover` the configured discovery source is
   * registered as one all-or-nothing batch; a failing batch leaves the registry
   * initialized with none of that batch's entries.
   */
  init(autoDiscover = true): void {
    this.initialize(autoDiscover);
  }

  /**
   * Binds `contract` to a factory. If the registry was never initialized this first
   * calls `init(false)`: an implicit one-time side effect that skips discovery.
   *
   * Eager bindings are constructed before the entry is inserted, so a failing factory
   * leaves nothing behind.
   */
  register<T>(contract: Contract<T>, factory: Factory<T>, lifecycle: Lifecycle = 'eager'): true {
    const bindings = this.ensureInitialized();
    this.assertUnbound(bindings, contract);
    return this.insert(bindings, contract, createBinding(contract, factory, lifecycle));
  }

  registerClass<T, C extends T>(contract: Contract<T>, impl: Implementation<C>, lifecycle: Lifecycle = 'eager'): true {
    return this.register<T>(contract, () => new impl(), lifecycle);
  }

  /** Binds a pre-built instance. Same implicit `init(false)` as `register`. */
  registerInstance<T>(contract: Contract<T>, instance: T): true {
    const bindings = this.ensureInitialized();
    this.assertUnbound(bindings, contract);
    return this.insert(bindings, contract, EagerSingletonBinding.fromInstance(contract, instance));
  }

  isRegistered(contract: AnyContract): boolean {
    return this.bindings !== null && this.bindings.has(contract);
  }

  resolve<T>(contract: Contract<T>): T {
    const bindings = this.bindings;
    if (!bindings) throw new NotInitializedError(this.name);
    const binding = bindings.get(contract);
    if (!binding) throw new NotRegisteredError(contract);
    return this.materialize(contract, binding);
  }

  contracts(): string[] {
    if (!this.bindings) return [];
    return [...this.bindings.keys()].map((c) => c.name).sort((a, b) => a.localeCompare(b));
  }

  private initialize(autoDiscover: boolean): Map<AnyContract, Binding<unknown>> {
    if (this.bindings) throw new AlreadyInitializedError(this.name);
    const bindings = new Map<AnyContract, Binding<unknown>>();
    this.bindings = bindings;
    this.logger.debug(`registry ${this.name} initialized`, { autoDiscover });

    if (autoDiscover) this.discover(bindings);
    return bindings;
  }

  private ensureInitialized(): Map<AnyContract, Binding<unknown>> {
    return this.bindings ?? this.initialize(false);
  }

  private assertUnbound(bindings: Map<AnyContract, Binding<unknown>>, contract: AnyContract): void {
    if (bindings.has(contract)) throw new AlreadyRegisteredError(contract);
  }

  private insert(bindings: Map<AnyContract, Binding<unknown>>, contract: AnyContract, binding: Binding<unknown>): true {
    // Eager construction may have re-entered register for the same contract.
    this.assertUnbound(bindings, contract);
    this.logger.debug(`registered ${contract.name} (${binding.lifecycle})`);
    bindings.set(contract, binding);
    return true;
  }

  // The binding was stored under `contract`, whose factory produced a T.
  private materialize<T>(contract: Contract<T>, binding: Binding<unknown>): T {
    try {
      return (binding as Binding<T>).get();
    } catch (e) {
      if (e instanceof ActivationError) this.logger.error(`activation of ${contract.name} failed: ${describeError(e.cause)}`);
      throw e;
    }
  }

  // Markers go through registerClass in order, so an eager constructor can resolve
  // contracts discovered before it. On the first failure the batch's entries are removed.
  private discover(bindings: Map<AnyContract, Binding<unknown>>): void {
    const markers = collectMarkers(this.discovery);
    if (!markers.length) return;

    const inserted: AnyContract[] = [];
    try {
      checkMarkers(markers);
      for (const { contract, implementation, lifecycle } of markers) {
        this.registerClass(contract, implementation, lifecycle);
        inserted.push(contract);
      }
    } catch (e) {
      for (const contract of inserted) bindings.delete(contract);
      if (e instanceof RegistryError) this.logger.error(`discovery aborted for registry ${this.name}: ${e.message}`);
      throw e;
    }
    this.logger.info(`discovered ${markers.length} implementation(s)`, markers.map((m) => `${m.contract.name}=${m.implementation.name}`));
  }
}
