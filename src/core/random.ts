export type RandomFn = () => number;

// 32-bit LCG, reproducible across runs for a given seed. Returns values in [0, 1).
export function createSeededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state / 2 ** 32;
  };
}

export function pickIndex(length: number, random: RandomFn = Math.random): number {
  if (length === 0) {
    throw new Error('Cannot select from empty array');
  }
  return Math.min(Math.floor(random() * length), length - 1);
}
