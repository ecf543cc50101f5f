import { describe, expect, it } from 'vitest';
import { createSeededRandom, hashSeed, randomInt, sampleUnit } from './rng.ts';

describe('createSeededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('diverges for different seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });
});

describe('hashSeed', () => {
  it('is stable and unsigned', () => {
    expect(hashSeed('ladder')).toBe(hashSeed('ladder'));
    expect(hashSeed('ladder')).toBeGreaterThanOrEqual(0);
    expect(hashSeed('ladder')).not.toBe(hashSeed('ladder-2'));
  });
});

describe('sampleUnit', () => {
  it('clamps out-of-range samples into [0, 1)', () => {
    expect(sampleUnit(() => -0.5)).toBe(0);
    expect(sampleUnit(() => Number.NaN)).toBe(0);
    expect(sampleUnit(() => 1)).toBeLessThan(1);
    expect(sampleUnit(() => 0.25)).toBe(0.25);
  });
});

describe('randomInt', () => {
  it('maps the unit interval onto an inclusive range', () => {
    expect(randomInt(3, 6, () => 0)).toBe(3);
    expect(randomInt(3, 6, () => 0.5)).toBe(5);
    expect(randomInt(3, 6, () => 0.999)).toBe(6);
  });

  it('consumes a draw even when the range holds one value', () => {
    let draws = 0;
    const value = randomInt(4, 4, () => {
      draws += 1;
      return 0.7;
    });
    expect(value).toBe(4);
    expect(draws).toBe(1);
  });

  it('handles negative offsets', () => {
    expect(randomInt(-1, 2, () => 0)).toBe(-1);
    expect(randomInt(-1, 2, () => 0.99)).toBe(2);
  });
});
