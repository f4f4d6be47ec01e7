export type ContractGuard<T> = (value: unknown) => value is T;

export type ContractOptions<T> = {
  // Method names every implementation must provide.
  methods?: ReadonlyArray<string>;
  guard?: ContractGuard<T>;
};

/**
 * Token a consumer programs against. Identity is the token object itself, so two
 * contracts with the same name are still distinct keys.
 */
export interface Contract<T> {
  readonly name: string;
  readonly methods: ReadonlyArray<string>;
  readonly guard?: ContractGuard<T>;
  // Phantom slot carrying T; never set at runtime.
  readonly __type?: T;
}

export type AnyContract = Contract<unknown>;

export function defineContract<T>(name: string, opts: ContractOptions<T> = {}): Contract<T> {
  if (!name) throw new Error('Contract name is required');
  const contract: Contract<T> = {
    name,
    methods: Object.freeze([...(opts.methods ?? [])]),
    ...(opts.guard ? { guard: opts.guard } : {}),
  };
  return Object.freeze(contract);
}

export function hasContractChecks(contract: AnyContract): boolean {
  return contract.methods.length > 0 || contract.guard !== undefined;
}

// Looks up the prototype chain, so a class prototype or an instance both work.
export function missingMethods(contract: AnyContract, target: object): string[] {
  return contract.methods.filter((m) => typeof Reflect.get(target, m) !== 'function');
}

export function satisfiesContract<T>(contract: Contract<T>, value: unknown): value is T {
  if (value === null || value === undefined) return false;
  if (typeof value === 'object' || typeof value === 'function') {
    if (missingMethods(contract, value).length) return false;
  } else if (contract.methods.length) {
    return false;
  }
  return contract.guard ? contract.guard(value) : true;
}
