import { z } from "zod";
import type { MazeOptions } from "../../interfaces/interfaces";
import { ConfigurationError } from "../errors/ConfigurationError";

const UINT32_MAX = 0xffffffff;

export const MIN_SIZE = 5;
export const MAX_SIZE = 301;
export const DEFAULT_EXTRA_PASSAGES = 3;

const OddDimensionSchema = z
  .number()
  .int({ message: "must be an integer" })
  .min(MIN_SIZE, { message: `must be at least ${MIN_SIZE}` })
  .max(MAX_SIZE, { message: `must be at most ${MAX_SIZE}` })
  .refine((n) => n % 2 === 1, { message: "must be odd" });

export const MazeConfigSchema = z.object({
  width: OddDimensionSchema,
  height: OddDimensionSchema,
  seed: z
    .number()
    .int({ message: "must be an integer" })
    .min(0, { message: "must be non-negative" })
    .max(UINT32_MAX, { message: "must fit in uint32" })
    .optional(),
  multiplePaths: z.boolean().default(false),
  extraPassages: z
    .number()
    .int({ message: "must be an integer" })
    .min(1, { message: "must be at least 1" })
    .max(64, { message: "must be at most 64" })
    .default(DEFAULT_EXTRA_PASSAGES),
  randomizeStart: z.boolean().default(false),
  randomizeGoal: z.boolean().default(false),
});

export type MazeConfig = z.infer<typeof MazeConfigSchema>;

export function parseMazeConfig(options: MazeOptions): MazeConfig {
  const parsed = MazeConfigSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}
