import type { AnyContract } from '../contracts/contract.js';

export type RegistryErrorCode =
  | 'already_initialized'
  | 'not_initialized'
  | 'already_registered'
  | 'not_registered'
  | 'activation_failed'
  | 'contract_mismatch';

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryError';
    this.code = code;
  }
}

export class AlreadyInitializedError extends RegistryError {
  constructor(registryName: string) {
    super('already_initialized', `Registry ${registryName} is already initialized. Only call init once`);
    this.name = 'AlreadyInitializedError';
  }
}

export class NotInitializedError extends RegistryError {
  constructor(registryName: string) {
    super('not_initialized', `Registry ${registryName} is not initialized. Call init or register first`);
    this.name = 'NotInitializedError';
  }
}

export class AlreadyRegisteredError extends RegistryError {
  readonly contract: AnyContract;

  constructor(contract: AnyContract) {
    super('already_registered', `${contract.name} already registered`);
    this.name = 'AlreadyRegisteredError';
    this.contract = contract;
  }
}

export class NotRegisteredError extends RegistryError {
  readonly contract: AnyContract;

  constructor(contract: AnyContract) {
    super('not_registered', `${contract.name} not registered`);
    this.name = 'NotRegisteredError';
    this.contract = contract;
  }
}

export class ActivationError extends RegistryError {
  readonly contract: AnyContract;

  constructor(contract: AnyContract, message: string, cause?: unknown) {
    super('activation_failed', `Failed to activate ${contract.name}: ${message}`, { cause });
    this.name = 'ActivationError';
    this.contract = contract;
  }
}

export class ContractMismatchError extends RegistryError {
  readonly contract: AnyContract;
  readonly implementation: string;
  readonly missing: string[];

  constructor(contract: AnyContract, implementation: string, missing: string[] = []) {
    const suffix = missing.length ? ` (missing: ${missing.join(', ')})` : '';
    super('contract_mismatch', `The class ${implementation} does not implement ${contract.name}.${suffix}`);
    this.name = 'ContractMismatchError';
    this.contract = contract;
    this.implementation = implementation;
    this.missing = missing;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
