// ============================================================================
// @probekit/core — Error Types
// ============================================================================

/**
 * Machine-readable failure category carried by every Probekit error.
 */
export type ErrorKind =
  | 'InvalidKey'
  | 'NotFound'
  | 'OutOfMemory'
  | 'InvalidConfig'
  | 'HashRange'
  | 'Disposed';

/**
 * Base error class for all Probekit errors.
 */
export class ProbekitError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'ProbekitError';
    this.kind = kind;
  }
}

// ---------------------------------------------------------------------------
// Key Errors
// ---------------------------------------------------------------------------

/**
 * Thrown by insert when the key is absent or longer than the table allows.
 */
export class InvalidKeyError extends ProbekitError {
  public readonly key: string | null | undefined;

  constructor(key: string | null | undefined, reason = 'Key cannot be null.') {
    super('InvalidKey', reason);
    this.name = 'InvalidKeyError';
    this.key = key;
  }
}

/**
 * Thrown by find and remove when the key is absent or not stored.
 */
export class NotFoundError extends ProbekitError {
  public readonly key: string | null | undefined;

  constructor(key: string | null | undefined) {
    super('NotFound', key == null ? 'Key cannot be null.' : `Key "${key}" not in table.`);
    this.name = 'NotFoundError';
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// Capacity Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a full probe cycle finds neither a free slot nor a tombstone.
 */
export class OutOfMemoryError extends ProbekitError {
  public readonly key: string;
  public readonly tableSize: number;

  constructor(key: string, tableSize: number) {
    super('OutOfMemory', `Failed to insert "${key}": no free slot in table of size ${tableSize}.`);
    this.name = 'OutOfMemoryError';
    this.key = key;
    this.tableSize = tableSize;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when table options fail validation.
 */
export class TableConfigError extends ProbekitError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('InvalidConfig', `Invalid table configuration: ${issues.join('; ')}`);
    this.name = 'TableConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown when a hash function returns something that cannot be used as an index.
 */
export class HashRangeError extends ProbekitError {
  public readonly role: 'primary' | 'secondary';
  public readonly value: number;

  constructor(role: 'primary' | 'secondary', value: number) {
    super('HashRange', `The ${role} hash returned ${value}; expected a non-negative integer.`);
    this.name = 'HashRangeError';
    this.role = role;
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Lifecycle Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a table is used after dispose().
 */
export class TableDisposedError extends ProbekitError {
  constructor(operation: string) {
    super('Disposed', `Cannot ${operation}: table has been disposed.`);
    this.name = 'TableDisposedError';
  }
}
