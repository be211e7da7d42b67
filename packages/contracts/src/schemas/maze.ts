import { z } from "zod";
import { SeedSchema } from "./seed";

/**
 * Largest supported width or height. Wall sets grow with 2 * w * h, so the
 * bound keeps a single maze under two million walls.
 */
export const MAX_MAZE_DIMENSION = 1000;

export const DimensionSchema = z
  .number({ error: "Dimension must be a number" })
  .int({ error: "Dimension must be an integer" })
  .min(1, { error: "Dimension must be at least 1" })
  .max(MAX_MAZE_DIMENSION, {
    error: `Dimension cannot exceed ${MAX_MAZE_DIMENSION}`,
  });

export const MazeConfigSchema = z.object({
  width: DimensionSchema,
  height: DimensionSchema,
  seed: SeedSchema.optional(),
});
