import { z } from "zod";

const CoordinateSchema = z
  .number()
  .int({ error: "Coordinates must be integers" })
  .min(0, { error: "Coordinates must be non-negative" });

export const CellTupleSchema = z.tuple([CoordinateSchema, CoordinateSchema]);

/**
 * One serialized wall. Order of the two cells is free on input; the
 * receiving wall set canonicalizes it.
 */
export const WallPairSchema = z
  .tuple([CellTupleSchema, CellTupleSchema])
  .refine(
    ([[ax, ay], [bx, by]]) => Math.abs(ax - bx) + Math.abs(ay - by) === 1,
    { error: "Wall cells must be adjacent" },
  );

export const WallPairsSchema = z.array(WallPairSchema);
