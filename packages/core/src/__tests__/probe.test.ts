import { describe, expect, it } from 'vitest';
import { HashRangeError } from '../errors.js';
import { probeSequence, probeStart, probeStride } from '../probe.js';

describe('probe sequencing', () => {
  it('visits every slot once when the stride is coprime with the size', () => {
    expect([...probeSequence(5, 3, 7)]).toEqual([5, 1, 4, 0, 3, 6, 2]);
  });

  it('steps by one for linear probing', () => {
    expect([...probeSequence(1, 1, 3)]).toEqual([1, 2, 0]);
  });

  it('stops early when the walk returns to the start', () => {
    expect([...probeSequence(0, 2, 4)]).toEqual([0, 2]);
  });

  it('reduces the primary hash modulo the table size', () => {
    expect(probeStart('k', 7, () => 9)).toBe(2);
  });

  it('uses a stride of 1 without a secondary hash', () => {
    expect(probeStride('k', 7, undefined)).toBe(1);
  });

  it('passes tableSize - 1 to the secondary hash and adds one', () => {
    const seen: number[] = [];
    const stride = probeStride('k', 7, (_key, modulus) => {
      seen.push(modulus);
      return 10;
    });
    // 10 % 6 + 1
    expect(stride).toBe(5);
    expect(seen).toEqual([6]);
  });

  it('keeps the stride at 1 for a two-slot table', () => {
    expect(probeStride('k', 2, () => 5)).toBe(1);
  });

  it('rejects hash outputs that are not non-negative integers', () => {
    expect(() => probeStart('k', 7, () => -3)).toThrow(HashRangeError);
    expect(() => probeStart('k', 7, () => Number.NaN)).toThrow(
      'The primary hash returned NaN; expected a non-negative integer.',
    );
    expect(() => probeStride('k', 7, () => 1.5)).toThrow(
      'The secondary hash returned 1.5; expected a non-negative integer.',
    );
  });
});
