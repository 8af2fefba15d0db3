/**
 * Recursive Backtracker generator tests
 */

import { describe, expect, it } from "vitest";
import { SeededRandom } from "@delve/contracts";
import { applyAlgorithm, recursiveBacktracker } from "../src/algorithms";
import { Grid } from "../src/core/grid";
import { linkChecksum } from "../src/core/hash/checksum";
import { validateMaze } from "../src/validation/invariant-checks";

describe("RecursiveBacktracker", () => {
  it("requires a closed grid", () => {
    expect(recursiveBacktracker.requires).toBe("closed");
    const result = applyAlgorithm(recursiveBacktracker, Grid.open(4, 4), new SeededRandom(1));
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("GRID_STATE_MISMATCH");
  });

  it("produces a perfect maze", () => {
    for (const seed of [10, 20, 30]) {
      const grid = recursiveBacktracker.apply(Grid.closed(12, 9), new SeededRandom(seed));

      expect(grid.size).toBe(108);
      expect(grid.linkCount()).toBe(107);
      expect(validateMaze(grid, { requirePerfect: true }).success).toBe(true);
    }
  });

  it("handles a single column", () => {
    const grid = recursiveBacktracker.apply(Grid.closed(5, 1), new SeededRandom(3));
    for (let row = 1; row < 5; row++) {
      const cell = grid.at(row, 0);
      expect(cell !== undefined && cell.isLinked(cell.north)).toBe(true);
    }
  });

  it("applies through the registry helper", () => {
    const grid = Grid.closed(4, 4);
    const result = applyAlgorithm(recursiveBacktracker, grid, new SeededRandom(2));
    expect(result.isOk()).toBe(true);
    expect(result.value).toBe(grid);
    expect(grid.linkCount()).toBe(15);
  });

  it("is deterministic for a seed", () => {
    const a = recursiveBacktracker.apply(Grid.closed(10, 10), new SeededRandom(64));
    const b = recursiveBacktracker.apply(Grid.closed(10, 10), new SeededRandom(64));
    expect(linkChecksum(a)).toBe(linkChecksum(b));
  });
});
