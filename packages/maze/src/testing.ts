/**
 * Testing utilities for maze generation.
 * Kept apart from validation.ts because they depend on the generation API.
 */

import { buildMazeConfig, type MazeConfig } from "@labyrinth/contracts";
import { generate } from "./api";
import { calculateWallSetChecksum } from "./core/hash/checksum";

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  override readonly name = "DeterminismViolationError";

  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
  }
}

/**
 * A config that pins its seed. Determinism is meaningless without one.
 */
export type SeededMazeConfig = MazeConfig & { readonly seed: number };

function generateChecksum(config: SeededMazeConfig): {
  checksum: string;
  durationMs: number;
} {
  const startTime = performance.now();
  const walls = generate(config.width, config.height, config.seed);
  return {
    checksum: calculateWallSetChecksum(config.width, config.height, walls),
    durationMs: performance.now() - startTime,
  };
}

/**
 * Assert that a seed reproduces its maze.
 *
 * Generates the maze `runs` times, each with a fresh generator, and compares
 * checksums.
 *
 * @throws {MazeError} when the config itself is invalid
 * @throws {DeterminismViolationError} If different runs produce different checksums
 *
 * @example
 * ```typescript
 * it("seed 12345 is reproducible", () => {
 *   assertDeterministic({ width: 40, height: 30, seed: 12345 });
 * });
 * ```
 */
export function assertDeterministic(
  config: SeededMazeConfig,
  runs: number = 3,
): void {
  const { uniqueChecksums } = testDeterminism(config, runs);
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 *
 * Useful for debugging determinism issues.
 *
 * @throws {MazeError} when the config itself is invalid
 */
export function testDeterminism(
  config: SeededMazeConfig,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  durations: number[];
  avgDuration: number;
} {
  buildMazeConfig(config).getOrThrow();

  const checksums: string[] = [];
  const durations: number[] = [];
  for (let i = 0; i < runs; i++) {
    const run = generateChecksum(config);
    checksums.push(run.checksum);
    durations.push(run.durationMs);
  }

  const uniqueChecksums = [...new Set(checksums)];
  const avgDuration =
    durations.length > 0
      ? durations.reduce((a, b) => a + b, 0) / durations.length
      : 0;

  return {
    deterministic: uniqueChecksums.length <= 1,
    checksums,
    uniqueChecksums,
    durations,
    avgDuration,
  };
}
