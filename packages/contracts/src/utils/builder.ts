import { MazeConfigSchema } from "../schemas/maze";
import { SeedSchema } from "../schemas/seed";
import { MazeError, type MazeErrorCode } from "../types/error";
import type { MazeConfig } from "../types/maze";
import { Err, Ok, type Result } from "../types/result";

/**
 * Defaults of the command-line demo the kernel grew out of.
 */
export const DEFAULT_MAZE_WIDTH = 10;
export const DEFAULT_MAZE_HEIGHT = 10;

export type BuildConfigInput = Partial<MazeConfig>;

function codeForField(field: PropertyKey | undefined): MazeErrorCode {
  switch (field) {
    case "width":
    case "height":
      return "INVALID_DIMENSIONS";
    case "seed":
      return "INVALID_SEED";
    default:
      return "INVALID_CONFIG";
  }
}

/**
 * Fill in defaults and validate a maze configuration.
 *
 * The error code follows the first offending field: dimensions report
 * `INVALID_DIMENSIONS`, the seed `INVALID_SEED`.
 */
export function buildMazeConfig(
  input: BuildConfigInput = {},
): Result<MazeConfig, MazeError> {
  const candidate: MazeConfig = {
    width: input.width ?? DEFAULT_MAZE_WIDTH,
    height: input.height ?? DEFAULT_MAZE_HEIGHT,
    ...(input.seed !== undefined && { seed: input.seed }),
  };

  const parsed = MazeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const code = codeForField(parsed.error.issues[0]?.path[0]);
    return Err(MazeError.fromZodError(code, parsed.error));
  }
  return Ok(parsed.data);
}

const DECIMAL_DIGITS = /^\d+$/;

/**
 * Validate a seed collected from an untyped source (query string, form
 * field). Strings must be plain decimal digits, optionally padded with
 * whitespace; exponent, hex and binary forms are `INVALID_SEED`.
 */
export function parseSeed(value: unknown): Result<number, MazeError> {
  let numeric = value;
  if (typeof value === "string") {
    const text = value.trim();
    if (!DECIMAL_DIGITS.test(text)) {
      return Err(
        new MazeError("INVALID_SEED", "Seed text must be a decimal integer", {
          value,
        }),
      );
    }
    numeric = Number(text);
  }

  const parsed = SeedSchema.safeParse(numeric);
  if (!parsed.success) {
    return Err(MazeError.fromZodError("INVALID_SEED", parsed.error));
  }
  return Ok(parsed.data);
}
