import { describe, expect, it } from 'vitest';
import { type CompactionHost, compactByRehash, compactByStride } from '../compaction.js';
import { ProbeTable } from '../table.js';
import type { HashFunction, OccupiedSlot, Slot } from '../types.js';

// ============================================================================
// PACK Compaction Tests
// ============================================================================

function fixedHash(positions: Record<string, number>): HashFunction {
  return (key, modulus) => (positions[key] ?? 0) % modulus;
}

/**
 * Minimal host over a plain array with linear probing from fixed homes.
 * Records every placement so tests can check what moved.
 */
function arrayHost(layout: (string | null)[], homes: Record<string, number>) {
  const size = layout.length;
  const slots = layout.map<Slot<number>>((key, i) =>
    key === null ? { state: 'UNOCCUPIED', key: '' } : { state: 'OCCUPIED', key, value: i },
  );
  const placed: string[] = [];

  const host: CompactionHost<number> = {
    tableSize: () => size,
    slotAt: (index) => slots[index],
    startOf: (key) => homes[key] ?? 0,
    strideOf: () => 1,
    vacate: (index) => {
      const slot = slots[index];
      if (slot.state !== 'OCCUPIED') return undefined;
      slots[index] = { state: 'UNOCCUPIED', key: '' };
      return slot;
    },
    place: (key, value) => {
      placed.push(key);
      for (let step = 0, i = homes[key] ?? 0; step < size; step++, i = (i + 1) % size) {
        if (slots[i].state === 'UNOCCUPIED') {
          const entry: OccupiedSlot<number> = { state: 'OCCUPIED', key, value };
          slots[i] = entry;
          return i;
        }
      }
      throw new Error('full');
    },
  };

  const keys = () => slots.map((slot) => (slot.state === 'OCCUPIED' ? slot.key : null));
  return { host, placed, keys };
}

describe('compactByStride', () => {
  it('re-places the cluster up to the next free slot', () => {
    // hole at 1; b and c hash to 0, d hashes to 3
    const { host, placed, keys } = arrayHost(['a', null, 'b', 'c', 'd', null, null], {
      a: 0,
      b: 0,
      c: 0,
      d: 3,
    });
    compactByStride(host, 1, 'removed');
    expect(placed).toEqual(['b', 'c', 'd']);
    expect(keys()).toEqual(['a', 'b', 'c', 'd', null, null, null]);
  });

  it('does nothing when the next slot is already free', () => {
    const { host, placed } = arrayHost(['a', null, null, 'b'], { a: 0, b: 3 });
    compactByStride(host, 1, 'removed');
    expect(placed).toEqual([]);
  });

  it('walks around the end of the array', () => {
    const { host, keys } = arrayHost(['c', null, null, 'x', null, 'a', null], {
      a: 5,
      c: 5,
      x: 3,
    });
    // remove at 6: cluster continues at 0 with c
    compactByStride(host, 6, 'removed');
    expect(keys()).toEqual([null, null, null, 'x', null, 'a', 'c']);
  });

  it('re-places the whole cycle when the hole is the only free slot', () => {
    // full table of three keys homed at 0, middle one removed
    const { host, placed, keys } = arrayHost(['a', null, 'c'], { a: 0, c: 0 });
    compactByStride(host, 1, 'removed');
    expect(placed).toEqual(['c', 'a']);
    expect(keys()).toEqual(['a', 'c', null]);
  });
});

describe('compactByRehash', () => {
  it('moves only entries whose own path crossed the hole', () => {
    // b (home 0) and d (home 1) depend on the hole at 1; x (home 3) does not
    const { host, placed, keys } = arrayHost(['a', null, 'b', 'x', 'd', null, null], {
      a: 0,
      b: 0,
      x: 3,
      d: 1,
    });
    compactByRehash(host, 1);
    expect(placed).toEqual(['b', 'd']);
    expect(keys()).toEqual(['a', 'b', 'd', 'x', null, null, null]);
  });

  it('leaves independent entries in place', () => {
    const { host, placed } = arrayHost([null, 'a', 'b', null], { a: 1, b: 2 });
    compactByRehash(host, 0);
    expect(placed).toEqual([]);
  });
});

describe('PACK under double hashing', () => {
  // A: home 0, stride 1. B: home 0, stride 2. B lands at 2 because A holds 0.
  const options = {
    primaryHash: fixedHash({ A: 0, B: 0 }),
    secondaryHash: fixedHash({ A: 0, B: 1 }),
    maxLoadFactor: 1,
  };

  it('rehash compaction moves an entry that probed past the hole with its own stride', () => {
    const table = new ProbeTable<string>({ ...options, compaction: 'rehash' });
    table.insert('A', 'a');
    table.insert('B', 'b');
    expect(table.slots()[2]).toEqual({ state: 'OCCUPIED', key: 'B', value: 'b' });

    table.remove('A');
    expect(table.slots()[0]).toEqual({ state: 'OCCUPIED', key: 'B', value: 'b' });
    expect(table.find('B')).toBe('b');
  });

  it('stride compaction follows the removed key and misses it', () => {
    const table = new ProbeTable<string>({ ...options, compaction: 'stride' });
    table.insert('A', 'a');
    table.insert('B', 'b');

    table.remove('A');
    // A's stride visits slot 1 first, which is free, so nothing moves.
    expect(table.slots()[2]).toEqual({ state: 'OCCUPIED', key: 'B', value: 'b' });
    expect(table.has('B')).toBe(false);
    expect(table.stats().count).toBe(1);
  });
});
