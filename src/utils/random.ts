// Seeded pseudo-random streams (mulberry32). Nothing here touches Math.random.

export type RandomSource = () => number;

export function createRng(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6D2B79F5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Independent stream for one consumer of a shared seed
export function deriveRng(seed: number, salt: number): RandomSource {
  return createRng(Math.imul(seed ^ salt, 0x9E3779B1) ^ salt);
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng();
}

// Inclusive on both ends
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

// Box-Muller; always consumes exactly two draws
export function gaussian(rng: RandomSource): number {
  const u1 = 1 - rng();
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
