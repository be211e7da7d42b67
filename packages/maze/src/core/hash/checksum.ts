/**
 * Maze Checksum
 *
 * Deterministic digest of a maze (dimensions plus canonical wall list), used
 * to compare mazes cheaply and to check that a seed reproduces its maze.
 *
 * Format: "v{version}:{fnv64 hex}". Bump the version whenever the hashed
 * data or its order changes.
 */

import type { ReadonlyWallSet } from "../walls/wall-set";
import { wallOrientation } from "../walls/wall";
import { createFNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

export function parseChecksum(
  checksum: string,
): { version: number; hash: string } | null {
  const match = /^v(\d+):([0-9a-f]{16})$/.exec(checksum);
  if (!match || !match[1] || !match[2]) return null;
  return { version: Number.parseInt(match[1], 10), hash: match[2] };
}

/**
 * Whether two checksums can be compared, and if so whether they match.
 * Checksums of different versions never match.
 */
export function checksumsAreCompatible(a: string, b: string): boolean {
  const parsedA = parseChecksum(a);
  const parsedB = parseChecksum(b);
  if (!parsedA || !parsedB) return false;

  if (parsedA.version !== parsedB.version) {
    console.warn(
      `[maze] Checksum version mismatch: v${parsedA.version} vs v${parsedB.version}`,
    );
    return false;
  }
  return parsedA.hash === parsedB.hash;
}

/**
 * Checksum of a maze. Walls are hashed in canonical order, so two sets with
 * the same walls hash the same regardless of how they were built.
 */
export function calculateWallSetChecksum(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
): string {
  const hasher = createFNV64Hasher()
    .updateInt32(width)
    .updateInt32(height)
    .updateInt32(walls.size);

  for (const wall of walls) {
    hasher
      .updateInt32(wall.a.x)
      .updateInt32(wall.a.y)
      .updateByte(wallOrientation(wall) === "east" ? 0 : 1);
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
