// ============================================================================
// @probekit/core — Type Definitions
// ============================================================================
//
// Central type definitions shared by the table, probe sequencing and
// compaction modules.
// ============================================================================

/**
 * Maps a key to an index in `[0, modulus)`.
 *
 * Used as the primary hash with `modulus = tableSize` and as the secondary
 * (stride) hash with `modulus = tableSize - 1`.
 */
export type HashFunction = (key: string, modulus: number) => number;

/** Release hook invoked when the table discards a stored value. */
export type FreeProc<T> = (value: T) => void;

/**
 * What remove() does with the vacated slot.
 * - `PACK` — the slot becomes free and the cluster behind it is compacted
 * - `MARK` — the slot becomes a tombstone
 */
export type DeletionPolicy = 'PACK' | 'MARK';

/**
 * How PACK compaction repairs the probe paths that crossed a freed slot.
 * - `rehash` — re-place every entry whose own probe path crossed the hole
 * - `stride` — re-place the cluster found by walking the removed key's stride
 */
export type CompactionStrategy = 'rehash' | 'stride';

export type SlotState = 'UNOCCUPIED' | 'OCCUPIED' | 'DELETED';

/** A slot holding a live entry. */
export interface OccupiedSlot<T> {
  readonly state: 'OCCUPIED';
  readonly key: string;
  readonly value: T;
}

/**
 * A free slot or a tombstone. Tombstones keep the key they last held,
 * which only shows up in diagnostics.
 */
export interface VacantSlot {
  readonly state: 'UNOCCUPIED' | 'DELETED';
  readonly key: string;
  readonly value?: undefined;
}

export type Slot<T> = OccupiedSlot<T> | VacantSlot;

/** Snapshot of table bookkeeping returned by `stats()`. */
export interface TableStats {
  /** Current capacity (always prime) */
  tableSize: number;
  /** Number of OCCUPIED slots */
  count: number;
  /** Lifetime sum of probe steps across all operations */
  probes: number;
  /** Number of resizes performed */
  expansions: number;
  /** count / tableSize */
  loadFactor: number;
  primaryHash: HashFunction;
  secondaryHash?: HashFunction;
}
