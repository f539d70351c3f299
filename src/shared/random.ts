const RANDOM_UINT32_INCREMENT = 0x6d2b79f5;
const UINT32_MAX_PLUS_ONE = 4_294_967_296;

/** Uniform draw over `[0, count)`. Seeded sources replay the same draws. */
export interface RandomSource {
  nextIndex: (count: number) => number;
}

function toIndex(sample: number, count: number): number {
  if (!Number.isSafeInteger(count) || count <= 0) {
    throw new RangeError(`[random] Count must be a positive safe integer, got ${count}.`);
  }

  return Math.min(count - 1, Math.floor(sample * count));
}

export function createMathRandomSource(): RandomSource {
  return {
    nextIndex: (count) => toIndex(Math.random(), count),
  };
}

// Mulberry32
export function createSeededRandomSource(seed: number): RandomSource {
  if (!Number.isFinite(seed)) {
    throw new RangeError(`[random] Seed must be a finite number, got ${seed}.`);
  }

  let state = Math.trunc(seed) >>> 0;

  const next = (): number => {
    state = (state + RANDOM_UINT32_INCREMENT) >>> 0;
    let mixed = state;
    mixed = Math.imul(mixed ^ (mixed >>> 15), mixed | 1);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return ((mixed ^ (mixed >>> 14)) >>> 0) / UINT32_MAX_PLUS_ONE;
  };

  return {
    nextIndex: (count) => toIndex(next(), count),
  };
}

export function pickRandom<TValue>(
  random: RandomSource,
  values: readonly TValue[],
): TValue | undefined {
  if (values.length === 0) {
    return undefined;
  }

  return values[random.nextIndex(values.length)];
}
