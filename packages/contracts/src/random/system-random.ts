import { SeededRandom } from "./seeded-random";

interface CryptoLike {
  getRandomValues(array: Uint32Array): Uint32Array;
}

function isCryptoLike(value: unknown): value is CryptoLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "getRandomValues" in value &&
    typeof value.getRandomValues === "function"
  );
}

let fallbackCounter = 0;

function fallbackUint32(): number {
  fallbackCounter = (fallbackCounter + 0x9e3779b9) >>> 0;
  const rng = new SeededRandom((Date.now() ^ fallbackCounter) >>> 0);
  return Math.floor(rng.next() * 0x100000000) >>> 0;
}

/**
 * Unsigned 32-bit random integer for seeding unseeded generators.
 *
 * Uses Web Crypto when the runtime exposes it and falls back to a
 * time-mixed PRNG otherwise.
 */
export function randomUint32(): number {
  const cryptoLike: unknown = Reflect.get(globalThis, "crypto");

  if (isCryptoLike(cryptoLike)) {
    const buffer = new Uint32Array(1);
    cryptoLike.getRandomValues(buffer);
    const value = buffer[0];
    if (value !== undefined) return value >>> 0;
  }

  return fallbackUint32();
}
