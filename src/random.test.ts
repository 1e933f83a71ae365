import { describe, it, expect } from 'vitest';
import { createRng, shuffle, sample } from './random.js';

describe('createRng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('produces values in [0, 1)', () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });
});

describe('shuffle', () => {
  it('returns a permutation without mutating the input', () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = shuffle(items, createRng(3));
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });
});

describe('sample', () => {
  it('takes the requested number of distinct items', () => {
    const picked = sample([1, 2, 3, 4, 5], 3, createRng(9));
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
  });

  it('caps the sample at the population size', () => {
    expect(sample(['a', 'b'], 5, createRng(9))).toHaveLength(2);
  });

  it('returns nothing for a zero count', () => {
    expect(sample(['a', 'b'], 0, createRng(9))).toEqual([]);
  });
});
