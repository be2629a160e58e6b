import { describe, it, expect } from 'vitest';
import { createSeededRandom, sampleIndices } from './random';

describe('createSeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    seqA.forEach(v => {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    });
  });
});

describe('sampleIndices', () => {
  it('returns distinct in-range indices', () => {
    const picked = sampleIndices(50, 20, createSeededRandom(1));
    expect(picked).toHaveLength(20);
    expect(new Set(picked).size).toBe(20);
    picked.forEach(i => {
      expect(i).toBeGreaterThanOrEqual(0);
      expect(i).toBeLessThan(50);
    });
  });

  it('caps the count at the population size', () => {
    expect(sampleIndices(3, 10, createSeededRandom(1)).sort()).toEqual([0, 1, 2]);
  });

  it('returns nothing for a non-positive count', () => {
    expect(sampleIndices(10, -1, createSeededRandom(1))).toEqual([]);
    expect(sampleIndices(10, 0, createSeededRandom(1))).toEqual([]);
  });
});
