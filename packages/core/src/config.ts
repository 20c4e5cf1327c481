// ============================================================================
// @probekit/core — Table Configuration
// ============================================================================

import { z } from 'zod';
import { TableConfigError } from './errors.js';
import { simpleHash } from './hashing.js';
import type { CompactionStrategy, DeletionPolicy, FreeProc, HashFunction } from './types.js';

/** Defaults applied to every option the caller leaves out. */
export const DEFAULT_TABLE_OPTIONS = {
  initialTableSize: 7,
  maxLoadFactor: 0.5,
  growthFactor: 2,
  deletionPolicy: 'PACK',
  compaction: 'rehash',
  maxKeyLength: 32,
} as const;

function hookSchema<F>() {
  return z.custom<F>((value) => typeof value === 'function', { message: 'Expected a function' });
}

/**
 * Validation schema for table options. Hooks are only checked for being
 * callable; the caller's own functions are kept as given.
 */
export function tableConfigSchema<T>() {
  return z.object({
    initialTableSize: z.number().int().min(1).default(DEFAULT_TABLE_OPTIONS.initialTableSize),
    maxLoadFactor: z.number().gt(0).max(1).default(DEFAULT_TABLE_OPTIONS.maxLoadFactor),
    growthFactor: z.number().gt(1).finite().default(DEFAULT_TABLE_OPTIONS.growthFactor),
    deletionPolicy: z.enum(['PACK', 'MARK']).default(DEFAULT_TABLE_OPTIONS.deletionPolicy),
    compaction: z.enum(['rehash', 'stride']).default(DEFAULT_TABLE_OPTIONS.compaction),
    maxKeyLength: z.number().int().min(1).default(DEFAULT_TABLE_OPTIONS.maxKeyLength),
    primaryHash: hookSchema<HashFunction>().optional(),
    secondaryHash: hookSchema<HashFunction>().optional(),
    freeProc: hookSchema<FreeProc<T>>().optional(),
  });
}

/** Options accepted by the table constructor. Every field is optional. */
export interface TableOptions<T> {
  /** Requested capacity; rounded up to the nearest prime */
  initialTableSize?: number;
  /** Load factor that triggers growth, in (0, 1] */
  maxLoadFactor?: number;
  /** Capacity multiplier applied on growth, > 1 */
  growthFactor?: number;
  deletionPolicy?: DeletionPolicy;
  compaction?: CompactionStrategy;
  /** Longest key insert() accepts */
  maxKeyLength?: number;
  primaryHash?: HashFunction;
  /** When set, probing uses double hashing instead of a stride of 1 */
  secondaryHash?: HashFunction;
  freeProc?: FreeProc<T>;
}

/** Fully resolved configuration, immutable for the table's lifetime. */
export interface TableConfig<T> {
  readonly initialTableSize: number;
  readonly maxLoadFactor: number;
  readonly growthFactor: number;
  readonly deletionPolicy: DeletionPolicy;
  readonly compaction: CompactionStrategy;
  readonly maxKeyLength: number;
  readonly primaryHash: HashFunction;
  readonly secondaryHash?: HashFunction;
  readonly freeProc?: FreeProc<T>;
}

/**
 * Validate options and fill in defaults. Accepts untrusted input, such as
 * options read from a file.
 *
 * @throws TableConfigError listing every failing field
 */
export function resolveTableConfig<T>(options: unknown = {}): TableConfig<T> {
  const result = tableConfigSchema<T>().safeParse(options);
  if (!result.success) {
    throw new TableConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return Object.freeze({
    initialTableSize: parsed.initialTableSize,
    maxLoadFactor: parsed.maxLoadFactor,
    growthFactor: parsed.growthFactor,
    deletionPolicy: parsed.deletionPolicy,
    compaction: parsed.compaction,
    maxKeyLength: parsed.maxKeyLength,
    primaryHash: parsed.primaryHash ?? simpleHash,
    secondaryHash: parsed.secondaryHash,
    freeProc: parsed.freeProc,
  });
}
