/**
 * Seed Utilities
 *
 * Seeds are plain unsigned 32-bit integers. These helpers turn other inputs
 * into seeds and validate seeds handed in by callers.
 */

import { parseSeed, randomUint32 } from "@labyrinth/contracts";

/**
 * Derive a seed from free-form text (DJB2 hash), e.g. a word typed by a
 * player. The same text always yields the same seed.
 *
 * @example
 * ```typescript
 * const walls = generate(20, 20, createSeedFromString("minotaur"));
 * ```
 */
export function createSeedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Draw a fresh seed from system randomness.
 */
export function randomSeed(): number {
  return randomUint32();
}

/**
 * Validate a caller-supplied seed, or draw one when none was given.
 *
 * @throws {MazeError} INVALID_SEED when the seed is not a uint32
 */
export function resolveSeed(seed: number | undefined): number {
  return seed === undefined ? randomSeed() : parseSeed(seed).getOrThrow();
}
