export type Lifecycle = 'eager' | 'lazy' | 'factory';

export type Factory<T> = () => T;

export type LifecycleFlags = {
  constructEagerly?: boolean;
  singleInstance?: boolean;
};

export function isLifecycle(v: unknown): v is Lifecycle {
  return v === 'eager' || v === 'lazy' || v === 'factory';
}

export function lifecycleFromFlags(flags: LifecycleFlags = {}): Lifecycle {
  const constructEagerly = flags.constructEagerly ?? true;
  const singleInstance = flags.singleInstance ?? true;
  if (!singleInstance) return 'factory';
  return constructEagerly ? 'eager' : 'lazy';
}
