import * as ROT from "rot-js";

export type Rng = typeof ROT.RNG;

/** An independent rot-js generator, so agents never disturb the shared one. */
export function createRng(seed?: number): Rng {
  const rng = ROT.RNG.clone();
  if (seed !== undefined) rng.setSeed(seed);
  return rng;
}

/** Uniform pick; null for an empty list. */
export function pick<T>(rng: Rng, items: readonly T[]): T | null {
  if (items.length === 0) return null;
  return items[Math.floor(rng.getUniform() * items.length)];
}
