/** Raised at setup when tunables are out of range; lists every problem found. */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid battle configuration:\n- ${issues.join('\n- ')}`);
    this.name = 'ConfigurationError';
    this.issues = [...issues];
  }
}

export type PersistenceOperation = 'read' | 'write' | 'reset';

/** Wraps a failure of the backing progress storage. */
export class PersistenceError extends Error {
  readonly operation: PersistenceOperation;
  readonly key: string;

  constructor(operation: PersistenceOperation, key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} progress key "${key}": ${reason}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
    this.key = key;
  }
}

/** Passes a {@link PersistenceError} through; wraps anything else thrown by a store. */
export function toPersistenceError(
  operation: PersistenceOperation,
  error: unknown,
  key = 'unknown'
): PersistenceError {
  return error instanceof PersistenceError ? error : new PersistenceError(operation, key, error);
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
