/**
 * Random number source threaded through every value provider so that a run
 * can be replayed from a seed.
 */
export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const mathRandom: Rng = {
  next: () => Math.random(),
};

// mulberry32
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function createRng(seed?: number): Rng {
  return seed === undefined ? mathRandom : createSeededRng(seed);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  return lo + Math.floor(rng.next() * (hi - lo + 1));
}

/** Float in [min, max] rounded to `decimals` places. */
export function randomFloat(rng: Rng, min: number, max: number, decimals = 2): number {
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  const factor = 10 ** decimals;
  const value = Math.round((lo + rng.next() * (hi - lo)) * factor) / factor;
  return Math.min(hi, Math.max(lo, value));
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(rng.next() * items.length)];
}

export function randomBytes(rng: Rng, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = Math.floor(rng.next() * 256);
  }
  return bytes;
}
