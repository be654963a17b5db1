import { RandomSource } from './types';

/**
 * Math.random backed source. Math.random is per-isolate and never torn,
 * so sharing it across concurrent selections is safe.
 */
export const mathRandomSource: RandomSource = {
  uniform(min: number, max: number): number {
    return min + Math.random() * (max - min);
  }
};

/**
 * Uniform index in [0, length)
 */
export function pickIndex(random: RandomSource, length: number): number {
  const index = Math.floor(random.uniform(0, length));
  // uniform() is closed on both ends, so `length` itself can come back
  return Math.min(Math.max(index, 0), length - 1);
}
