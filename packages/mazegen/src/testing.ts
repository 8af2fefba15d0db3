/**
 * Testing utilities for maze generation.
 * Kept apart from the validation module because it depends on the API.
 */

import type { MazeConfigInput } from "@delve/contracts";
import { generateMaze } from "./api";

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfigInput,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate `runs` times from the same config and require identical link
 * checksums.
 *
 * @throws {DeterminismViolationError} If runs disagree
 * @throws {MazeError} If a run fails
 *
 * @example
 * ```typescript
 * it("aldous-broder is deterministic", () => {
 *   assertDeterministic({ rows: 10, columns: 10, seed: 7, algorithm: "aldous-broder" });
 * });
 * ```
 */
export function assertDeterministic(config: MazeConfigInput, runs: number = 3): void {
  const checksums: string[] = [];

  for (let i = 0; i < runs; i++) {
    checksums.push(generateMaze(config).getOrThrow().checksum);
  }

  const unique = [...new Set(checksums)];
  if (unique.length > 1) {
    throw new DeterminismViolationError(unique, config);
  }
}
