import { z } from "zod";
import { seedFromString } from "../random/rng";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

const UINT32_MAX = 0xffffffff;
const MAX_DIMENSION = 1000;

/**
 * Identifiers of the grid-carving algorithms, in registry order.
 */
export const MAZE_ALGORITHM_IDS = [
  "binary-tree",
  "aldous-broder",
  "recursive-backtracker",
  "recursive-division",
] as const;

export type MazeAlgorithmId = (typeof MAZE_ALGORITHM_IDS)[number];

export const MazeAlgorithmIdSchema = z.enum(MAZE_ALGORITHM_IDS);

const DimensionSchema = z
  .number()
  .int("Dimensions must be integers")
  .min(1, "Dimensions must be at least 1")
  .max(MAX_DIMENSION, `Dimensions cannot exceed ${MAX_DIMENSION}`);

/**
 * A seed is either a uint32 or a non-empty name hashed to one.
 */
export const MazeSeedSchema = z.union([
  z
    .number()
    .int()
    .min(0, "Seed must be a non-negative integer")
    .max(UINT32_MAX, "Seed must fit in uint32"),
  z.string().min(1, "Seed name cannot be empty"),
]);

export const DivisionOptionsSchema = z.object({
  roomSize: z.number().int().min(2).max(MAX_DIMENSION),
  roomChance: z.number().min(0).max(1),
});

export const MazeConfigSchema = z
  .object({
    rows: DimensionSchema,
    columns: DimensionSchema,
    algorithm: MazeAlgorithmIdSchema.optional(),
    seed: MazeSeedSchema,
    deadEndFeatures: z.number().int().min(0).default(0),
    division: DivisionOptionsSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.division && data.algorithm !== "recursive-division") {
      ctx.addIssue({
        code: "custom",
        message: "Division options only apply to recursive-division",
        path: ["division"],
      });
    }
  });

export type MazeConfigInput = z.input<typeof MazeConfigSchema>;
export type MazeConfig = z.output<typeof MazeConfigSchema>;
export type DivisionOptions = z.output<typeof DivisionOptionsSchema>;

/**
 * Resolve a seed value to the uint32 fed to `SeededRandom`.
 */
export function resolveSeed(seed: MazeConfig["seed"]): number {
  return typeof seed === "string" ? seedFromString(seed) : seed >>> 0;
}

/**
 * Validate raw input into a `MazeConfig`.
 */
export function parseMazeConfig(input: unknown): Result<MazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse(input);
  if (parsed.success) {
    return Ok(parsed.data);
  }

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");

  return Err(MazeError.configInvalid(`Invalid maze config: ${summary}`, { issues }));
}
