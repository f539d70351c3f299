import { describe, expect, it } from 'vitest';

import {
  createMathRandomSource,
  createSeededRandomSource,
  pickRandom,
} from '../src/shared/random';
import { createScriptedRandom } from './support/random';

function draw(count: number, times: number, seed: number): number[] {
  const random = createSeededRandomSource(seed);
  return Array.from({ length: times }, () => random.nextIndex(count));
}

describe('random sources', () => {
  it('replays the same sequence for the same seed', () => {
    expect(draw(1_000, 32, 2024)).toEqual(draw(1_000, 32, 2024));
    expect(draw(1_000, 32, 2024)).not.toEqual(draw(1_000, 32, 2025));
  });

  it('keeps draws inside the requested range', () => {
    const seeded = createSeededRandomSource(9);
    const unseeded = createMathRandomSource();

    for (let count = 1; count <= 50; count += 1) {
      for (const random of [seeded, unseeded]) {
        const index = random.nextIndex(count);
        expect(Number.isInteger(index)).toBe(true);
        expect(index).toBeGreaterThanOrEqual(0);
        expect(index).toBeLessThan(count);
      }
    }
  });

  it('rejects empty or fractional counts and non-finite seeds', () => {
    const random = createSeededRandomSource(1);

    expect(() => random.nextIndex(0)).toThrow(RangeError);
    expect(() => random.nextIndex(2.5)).toThrow(RangeError);
    expect(() => createSeededRandomSource(Number.NaN)).toThrow(RangeError);
  });

  it('picks through the random source and returns undefined for empty lists', () => {
    const random = createScriptedRandom([2, 0]);

    expect(pickRandom(random, ['a', 'b', 'c'])).toBe('c');
    expect(pickRandom(random, ['d'])).toBe('d');
    expect(pickRandom(random, [])).toBeUndefined();
    expect(random.remaining()).toBe(0);
  });
});
