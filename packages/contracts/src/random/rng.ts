/**
 * Utility functions for random operations using any number generator
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Random element of an array, or undefined when it is empty
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array, walking from the last index down.
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const picked = result[j];
    const current = result[i];
    if (picked === undefined || current === undefined) continue;
    result[i] = picked;
    result[j] = current;
  }
  return result;
}
