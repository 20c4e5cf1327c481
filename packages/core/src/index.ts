// ============================================================================
// @probekit/core — Public API
// ============================================================================

// Table
export { ProbeTable, createTable } from './table.js';

// Configuration
export { DEFAULT_TABLE_OPTIONS, resolveTableConfig, tableConfigSchema } from './config.js';
export type { TableConfig, TableOptions } from './config.js';

// Types
export type {
  CompactionStrategy,
  DeletionPolicy,
  FreeProc,
  HashFunction,
  OccupiedSlot,
  Slot,
  SlotState,
  TableStats,
  VacantSlot,
} from './types.js';

// Probe sequencing
export { probeSequence, probeStart, probeStride } from './probe.js';

// Hash functions
export {
  HASH_NAMES,
  hashFunctions,
  isHashName,
  pjwHash,
  rsHash,
  simpleHash,
  universalHash,
} from './hashing.js';
export type { HashName } from './hashing.js';

// Prime sizing
export { isPrime, nextPrime } from './primes.js';

// Errors
export {
  HashRangeError,
  InvalidKeyError,
  NotFoundError,
  OutOfMemoryError,
  ProbekitError,
  TableConfigError,
  TableDisposedError,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Logging
export {
  debug,
  error,
  getLogLevel,
  info,
  isDebugEnabled,
  onLog,
  setConsoleOutput,
  setLogLevel,
  timer,
  Timer,
  warn,
} from './logger.js';
export type { LogCallback, LogEntry, LogLevel } from './logger.js';
