import type { Rng } from './types';

export const defaultRng: Rng = () => Math.random();

/**
 * Seeded random (mulberry32), for reproducible boards.
 */
export function seededRng(seed: number): Rng {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randInt(rng: Rng, max: number): number {
  return Math.floor(rng() * max);
}

// fisher-yates, in place
export function shuffle<T>(xs: T[], rng: Rng = defaultRng): T[] {
  for (let i = xs.length - 1; i > 0; i--) {
    const j = randInt(rng, i + 1);
    [xs[i], xs[j]] = [xs[j], xs[i]];
  }
  return xs;
}
