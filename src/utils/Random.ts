/** Uniform source in [0, 1). */
export type RandomSource = () => number;

// 32-bit LCG (Numerical Recipes constants)
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(1664525, state) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

export function randomInRange(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}
