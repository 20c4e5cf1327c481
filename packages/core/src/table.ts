// ============================================================================
// @probekit/core — Open-Addressing Table
// ============================================================================
//
// Fixed-capacity hash table mapping bounded-length string keys to values.
// All entries live directly in one slot array; collisions are resolved by
// probing (see probe.ts). Capacity is prime and grows by `growthFactor`
// whenever the next insert would push the load past `maxLoadFactor`.
//
// Deletion policies:
//   - MARK — removed slots become DELETED tombstones. Lookups walk past them,
//            inserts reuse the first one they meet.
//   - PACK — removed slots become UNOCCUPIED and the entries that depended on
//            them are moved back (see compaction.ts). No tombstones exist.
//
// Inserting a key that is already present overwrites its value; the previous
// value goes through `freeProc`.
// ============================================================================

import { type CompactionHost, compactByRehash, compactByStride } from './compaction.js';
import { type TableConfig, type TableOptions, resolveTableConfig } from './config.js';
import {
  InvalidKeyError,
  NotFoundError,
  OutOfMemoryError,
  TableDisposedError,
} from './errors.js';
import { logOutOfMemory, timer } from './logger.js';
import { nextPrime } from './primes.js';
import { probeSequence, probeStart, probeStride } from './probe.js';
import type { OccupiedSlot, Slot, TableStats, VacantSlot } from './types.js';

const UNOCCUPIED_SLOT: VacantSlot = Object.freeze({ state: 'UNOCCUPIED', key: '' } satisfies VacantSlot);

function occupied<T>(key: string, value: T): OccupiedSlot<T> {
  const slot: OccupiedSlot<T> = { state: 'OCCUPIED', key, value };
  return Object.freeze(slot);
}

function tombstone(key: string): VacantSlot {
  const slot: VacantSlot = { state: 'DELETED', key };
  return Object.freeze(slot);
}

function createSlots<T>(size: number): Slot<T>[] {
  return Array.from({ length: size }, () => UNOCCUPIED_SLOT);
}

/** Result of a successful lookup walk. */
interface Located<T> {
  index: number;
  slot: OccupiedSlot<T>;
}

/**
 * Open-addressing hash table with double hashing, tombstone or packing
 * deletion, and load-factor-triggered growth.
 *
 * @example
 * ```ts
 * const table = new ProbeTable<number>({
 *   initialTableSize: 7,
 *   maxLoadFactor: 0.5,
 *   secondaryHash: rsHash,
 * });
 *
 * table.insert('alpha', 1);
 * table.find('alpha'); // 1
 * table.remove('alpha');
 * table.stats().probes; // lifetime probe steps
 * ```
 */
export class ProbeTable<T> {
  private readonly config: TableConfig<T>;
  private slotArray: Slot<T>[];
  private capacity: number;
  private count = 0;
  private probes = 0;
  private expansions = 0;
  private disposed = false;

  constructor(options: TableOptions<T> = {}) {
    this.config = resolveTableConfig<T>(options);
    this.capacity = nextPrime(this.config.initialTableSize);
    this.slotArray = createSlots(this.capacity);
  }

  // ---- Public API ----

  /**
   * Insert or overwrite an entry.
   *
   * @throws InvalidKeyError when the key is null, undefined or too long
   * @throws OutOfMemoryError when no slot can take the entry
   */
  insert(key: string | null | undefined, value: T): void {
    this.assertLive('insert');
    if (key == null) {
      throw new InvalidKeyError(key);
    }
    if (key.length > this.config.maxKeyLength) {
      throw new InvalidKeyError(
        key,
        `Key "${key}" exceeds the maximum length of ${this.config.maxKeyLength}.`,
      );
    }

    if (this.growthRequired()) {
      // An overwrite leaves count unchanged, so it never needs a resize.
      const existing = this.locate(key);
      if (existing) {
        this.overwrite(existing, value);
        return;
      }
      // Hash failures must surface before the table is resized.
      const capacity = this.grownCapacity();
      probeStart(key, capacity, this.config.primaryHash);
      probeStride(key, capacity, this.config.secondaryHash);
      while (this.growthRequired()) {
        this.grow();
      }
    }
    this.place(key, value);
  }

  /**
   * Remove an entry, releasing its value.
   *
   * @throws NotFoundError when the key is absent or not stored
   */
  remove(key: string | null | undefined): void {
    this.assertLive('remove');
    const located = key == null ? undefined : this.locate(key);
    if (!located) {
      throw new NotFoundError(key);
    }

    const { index, slot } = located;
    this.release(slot.value);

    if (this.config.deletionPolicy === 'MARK') {
      this.slotArray[index] = tombstone(slot.key);
      this.count--;
      return;
    }

    this.slotArray[index] = UNOCCUPIED_SLOT;
    this.count--;
    if (this.config.compaction === 'stride') {
      compactByStride(this.compactionHost(), index, slot.key);
    } else {
      compactByRehash(this.compactionHost(), index);
    }
  }

  /**
   * Look up the value stored under `key`.
   *
   * @throws NotFoundError when the key is absent or not stored
   */
  find(key: string | null | undefined): T {
    this.assertLive('find');
    const located = key == null ? undefined : this.locate(key);
    if (!located) {
      throw new NotFoundError(key);
    }
    return located.slot.value;
  }

  /** Non-throwing lookup. Counts probes like find(). */
  has(key: string | null | undefined): boolean {
    this.assertLive('has');
    return key != null && this.locate(key) !== undefined;
  }

  /**
   * Release every value and free every slot. Capacity is kept.
   */
  clear(): void {
    this.assertLive('clear');
    for (let i = 0; i < this.capacity; i++) {
      const slot = this.slotArray[i];
      if (slot.state === 'OCCUPIED') {
        this.release(slot.value);
        this.count--;
      }
      this.slotArray[i] = UNOCCUPIED_SLOT;
    }
  }

  /**
   * Clear the table and drop its slot array. Every later call throws.
   */
  dispose(): void {
    if (this.disposed) return;
    this.clear();
    this.slotArray = [];
    this.disposed = true;
  }

  stats(): TableStats {
    this.assertLive('read stats');
    return {
      tableSize: this.capacity,
      count: this.count,
      probes: this.probes,
      expansions: this.expansions,
      loadFactor: this.count / this.capacity,
      primaryHash: this.config.primaryHash,
      secondaryHash: this.config.secondaryHash,
    };
  }

  /** Frozen copy of the slot array, for diagnostics. */
  slots(): readonly Slot<T>[] {
    this.assertLive('read slots');
    return Object.freeze([...this.slotArray]);
  }

  /** Live entries in physical slot order. */
  *entries(): IterableIterator<[string, T]> {
    this.assertLive('iterate');
    for (const slot of this.slotArray) {
      if (slot.state === 'OCCUPIED') {
        yield [slot.key, slot.value];
      }
    }
  }

  get size(): number {
    return this.count;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ---- Probing ----

  private startOf(key: string): number {
    return probeStart(key, this.capacity, this.config.primaryHash);
  }

  private strideOf(key: string): number {
    return probeStride(key, this.capacity, this.config.secondaryHash);
  }

  /**
   * Walk the probe path for `key` until it is found, an UNOCCUPIED slot
   * ends the path, or the cycle completes.
   */
  private locate(key: string): Located<T> | undefined {
    for (const index of probeSequence(this.startOf(key), this.strideOf(key), this.capacity)) {
      this.probes++;
      const slot = this.slotArray[index];
      if (slot.state === 'UNOCCUPIED') return undefined;
      if (slot.state === 'OCCUPIED' && slot.key === key) return { index, slot };
    }
    return undefined;
  }

  /**
   * The insertion walk. Remembers the first tombstone, stops at the first
   * UNOCCUPIED slot, and prefers the tombstone. Overwrites in place when the
   * key is met on the way.
   */
  private place(key: string, value: T): number {
    let reusable = -1;
    let free = -1;

    for (const index of probeSequence(this.startOf(key), this.strideOf(key), this.capacity)) {
      this.probes++;
      const slot = this.slotArray[index];
      if (slot.state !== 'OCCUPIED') {
        if (slot.state === 'UNOCCUPIED') {
          free = index;
          break;
        }
        if (reusable === -1) reusable = index;
        continue;
      }
      if (slot.key === key) {
        this.overwrite({ index, slot }, value);
        return index;
      }
    }

    const target = reusable !== -1 ? reusable : free;
    if (target === -1) {
      logOutOfMemory(key, this.capacity, this.count);
      throw new OutOfMemoryError(key, this.capacity);
    }

    this.slotArray[target] = occupied(key, value);
    this.count++;
    return target;
  }

  // ---- Growth ----

  private growthRequired(capacity = this.capacity): boolean {
    if (this.config.maxLoadFactor === 1) {
      return this.count === capacity;
    }
    return (this.count + 1) / capacity > this.config.maxLoadFactor;
  }

  private nextCapacity(capacity: number): number {
    return nextPrime(Math.ceil(capacity * this.config.growthFactor));
  }

  /** Capacity the table will have once every pending resize has run. */
  private grownCapacity(): number {
    let capacity = this.capacity;
    while (this.growthRequired(capacity)) {
      capacity = this.nextCapacity(capacity);
    }
    return capacity;
  }

  /**
   * Move every live entry into a fresh array of the next prime size at or
   * above `ceil(capacity * growthFactor)`. Physical order is not preserved.
   */
  private grow(): void {
    const oldSize = this.capacity;
    const oldSlots = this.slotArray;
    const t = timer('resize');

    this.capacity = this.nextCapacity(oldSize);
    this.slotArray = createSlots(this.capacity);
    this.count = 0;
    this.expansions++;

    for (const slot of oldSlots) {
      if (slot.state === 'OCCUPIED') {
        this.place(slot.key, slot.value);
      }
    }

    t.endWith({ oldSize, newSize: this.capacity, entries: this.count });
  }

  // ---- Internals ----

  /** Swap the value of a live entry; the old value is released first. */
  private overwrite({ index, slot }: Located<T>, value: T): void {
    if (!Object.is(slot.value, value)) {
      this.release(slot.value);
    }
    this.slotArray[index] = occupied(slot.key, value);
  }

  private release(value: T): void {
    const freeProc = this.config.freeProc;
    if (freeProc && value !== undefined && value !== null) {
      freeProc(value);
    }
  }

  private vacate(index: number): OccupiedSlot<T> | undefined {
    const slot = this.slotArray[index];
    if (slot.state !== 'OCCUPIED') return undefined;
    this.slotArray[index] = UNOCCUPIED_SLOT;
    this.count--;
    return slot;
  }

  private compactionHost(): CompactionHost<T> {
    return {
      tableSize: () => this.capacity,
      slotAt: (index) => this.slotArray[index],
      startOf: (key) => this.startOf(key),
      strideOf: (key) => this.strideOf(key),
      vacate: (index) => this.vacate(index),
      place: (key, value) => this.place(key, value),
    };
  }

  private assertLive(operation: string): void {
    if (this.disposed) {
      throw new TableDisposedError(operation);
    }
  }
}

/**
 * Create a table. Equivalent to `new ProbeTable<T>(options)`.
 */
export function createTable<T>(options: TableOptions<T> = {}): ProbeTable<T> {
  return new ProbeTable<T>(options);
}
