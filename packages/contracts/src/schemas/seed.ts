import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/**
 * A maze seed: any unsigned 32-bit integer.
 */
export const SeedSchema = z
  .number({ error: "Seed must be a number" })
  .int({ error: "Seed must be an integer" })
  .min(0, { error: "Seed must be non-negative" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

/**
 * Text form of a maze share code.
 */
export const ShareCodeSchema = z
  .base64url({ error: "Share code must be base64url" })
  .min(1, { error: "Share code cannot be empty" });
