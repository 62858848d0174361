import { describe, expect, it } from 'vitest';
import { createSeededRandom, shuffle, uniform } from '../random';

describe('createSeededRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a(), a()];
    expect([b(), b(), b(), b()]).toEqual(first);
  });

  it('produces different sequences for different seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('stays within [0, 1), including for seed 0', () => {
    const rng = createSeededRandom(0);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('uniform', () => {
  it('maps into the requested range', () => {
    const rng = createSeededRandom(9);
    for (let i = 0; i < 100; i++) {
      const value = uniform(rng, 0.5, 1.5);
      expect(value).toBeGreaterThanOrEqual(0.5);
      expect(value).toBeLessThan(1.5);
    }
  });
});

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const items = ['a', 'b', 'c', 'd', 'e'];
    const shuffled = shuffle(items, createSeededRandom(3));
    expect([...shuffled].sort()).toEqual(items);
    expect(items).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('reaches every position over many seeds', () => {
    const firsts = new Set<string>();
    for (let seed = 0; seed < 200; seed++) {
      firsts.add(shuffle(['a', 'b', 'c'], createSeededRandom(seed))[0]);
    }
    expect([...firsts].sort()).toEqual(['a', 'b', 'c']);
  });
});
