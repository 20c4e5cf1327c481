// ============================================================================
// @probekit/core — PACK Compaction
// ============================================================================
//
// After a PACK removal the freed slot is UNOCCUPIED, which ends every probe
// walk that reaches it. Entries that were placed past that slot along their
// probe path have to be moved back, or lookups for them stop short.
//
// Two strategies:
//
//   stride  — walk the removed key's stride from the hole to the end of the
//             cluster and re-place everything on the way. Exact for linear
//             probing. Under double hashing an entry whose own stride crossed
//             the hole can be missed.
//
//   rehash  — for each hole, re-place every entry whose own probe path
//             reaches the hole before its current slot. The slot it leaves
//             becomes the next hole. Each move brings an entry strictly
//             closer to the start of its path, so the loop terminates.
// ============================================================================

import { probeSequence } from './probe.js';
import type { OccupiedSlot, Slot } from './types.js';

/**
 * The slice of table internals compaction works against.
 */
export interface CompactionHost<T> {
  tableSize(): number;
  slotAt(index: number): Slot<T>;
  startOf(key: string): number;
  strideOf(key: string): number;
  /** Free the slot and return the entry it held, if any. Decrements count. */
  vacate(index: number): OccupiedSlot<T> | undefined;
  /** Run the insertion walk for an entry. Returns the slot it landed in. */
  place(key: string, value: T): number;
}

/**
 * Re-place the cluster that follows `vacated` along the removed key's stride.
 */
export function compactByStride<T>(host: CompactionHost<T>, vacated: number, removedKey: string): void {
  const size = host.tableSize();
  const stride = host.strideOf(removedKey);

  // The hole itself is UNOCCUPIED, so a walk round a full cycle stops just
  // before it and the whole cycle is re-placed.
  let stop = vacated;
  let current = vacated;
  for (let step = 0; step < size; step++) {
    current = (current + stride) % size;
    if (host.slotAt(current).state === 'UNOCCUPIED') {
      stop = (current - stride + size) % size;
      break;
    }
  }

  current = vacated;
  while (current !== stop) {
    current = (current + stride) % size;
    const entry = host.vacate(current);
    if (entry) {
      host.place(entry.key, entry.value);
    }
  }
}

/**
 * True when the probe path for `key` passes `hole` before reaching `at`.
 */
function pathCrosses<T>(host: CompactionHost<T>, key: string, at: number, hole: number): boolean {
  for (const index of probeSequence(host.startOf(key), host.strideOf(key), host.tableSize())) {
    if (index === at) return false;
    if (index === hole) return true;
  }
  return false;
}

/**
 * Move back every entry that depends on a freed slot, following each
 * entry's own probe path.
 */
export function compactByRehash<T>(host: CompactionHost<T>, vacated: number): void {
  const size = host.tableSize();
  const holes = [vacated];

  for (let hole = holes.pop(); hole !== undefined; hole = holes.pop()) {
    for (let index = 0; index < size; index++) {
      if (host.slotAt(hole).state !== 'UNOCCUPIED') break;

      const slot = host.slotAt(index);
      if (slot.state !== 'OCCUPIED' || !pathCrosses(host, slot.key, index, hole)) continue;

      host.vacate(index);
      host.place(slot.key, slot.value);
      holes.push(index);
    }
  }
}
