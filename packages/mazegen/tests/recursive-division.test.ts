/**
 * Recursive Division generator tests
 */

import { describe, expect, it } from "vitest";
import { SeededRandom } from "@delve/contracts";
import {
  applyAlgorithm,
  createRecursiveDivision,
  RecursiveDivision,
  recursiveDivision,
} from "../src/algorithms";
import { Grid } from "../src/core/grid";
import { linkChecksum } from "../src/core/hash/checksum";
import { checkConnectivity, validateMaze } from "../src/validation/invariant-checks";

function countAdjacentPairs(grid: Grid): { linked: number; walled: number } {
  let linked = 0;
  let walled = 0;
  for (const cell of grid.eachCell()) {
    for (const neighbor of [cell.east, cell.south]) {
      if (!neighbor) continue;
      if (cell.isLinked(neighbor)) linked++;
      else walled++;
    }
  }
  return { linked, walled };
}

describe("RecursiveDivision", () => {
  it("requires an open grid", () => {
    expect(recursiveDivision.requires).toBe("open");
    const result = applyAlgorithm(recursiveDivision, Grid.closed(8, 8), new SeededRandom(1));
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("GRID_STATE_MISMATCH");
    expect(result.error.message).toBe("recursive-division requires an open grid, got closed");
  });

  it("leaves both walls and passages on an 8x8 grid", () => {
    const grid = Grid.open(8, 8);
    recursiveDivision.apply(grid, new SeededRandom(2024));
    const { linked, walled } = countAdjacentPairs(grid);

    expect(grid.rows).toBe(8);
    expect(grid.columns).toBe(8);
    expect(grid.size).toBe(64);
    expect(linked).toBeGreaterThan(0);
    expect(walled).toBeGreaterThan(0);
    expect(linked + walled).toBe(112);
  });

  it("carves a spanning tree without rooms", () => {
    for (const seed of [1, 2, 3, 4]) {
      const grid = recursiveDivision.apply(Grid.open(8, 8), new SeededRandom(seed));
      expect(grid.linkCount()).toBe(63);
      expect(validateMaze(grid, { requirePerfect: true }).success).toBe(true);
    }
  });

  it("splits a 2x2 grid with one wall segment", () => {
    const grid = recursiveDivision.apply(Grid.open(2, 2), new SeededRandom(5));
    expect(grid.linkCount()).toBe(3);
  });

  it("cannot divide a single row", () => {
    const grid = recursiveDivision.apply(Grid.open(1, 5), new SeededRandom(5));
    expect(grid.linkCount()).toBe(4);
  });

  it("leaves open rooms when configured", () => {
    const algorithm = createRecursiveDivision({ roomSize: 5, roomChance: 1 });
    expect(algorithm).toBeInstanceOf(RecursiveDivision);
    expect(algorithm.perfect).toBe(false);

    // One wall across the whole grid, then both halves stay open as rooms
    const grid = algorithm.apply(Grid.open(4, 4), new SeededRandom(5));
    const { linked, walled } = countAdjacentPairs(grid);
    expect(walled).toBe(3);
    expect(linked).toBe(21);
    expect(checkConnectivity(grid).success).toBe(true);
    expect(validateMaze(grid).violations).toEqual([
      {
        type: "invariant.perfect",
        message: "Expected 15 passages, found 21: 6 extra passage(s) form cycles",
        severity: "warning",
      },
    ]);
  });

  it("always raises a wall across a grid smaller than a room", () => {
    const algorithm = createRecursiveDivision({ roomSize: 10, roomChance: 1 });
    for (const seed of [1, 2, 3, 4]) {
      const grid = algorithm.apply(Grid.open(3, 3), new SeededRandom(seed));
      expect(countAdjacentPairs(grid).walled).toBe(2);
    }
  });

  it("stays connected with rooms on larger grids", () => {
    const algorithm = createRecursiveDivision({ roomSize: 4, roomChance: 0.5 });
    for (const seed of [11, 12, 13]) {
      const grid = algorithm.apply(Grid.open(12, 12), new SeededRandom(seed));
      expect(checkConnectivity(grid).success).toBe(true);
      expect(grid.linkCount()).toBeGreaterThanOrEqual(143);
    }
  });

  it("is deterministic for a seed", () => {
    const a = recursiveDivision.apply(Grid.open(9, 7), new SeededRandom(90));
    const b = recursiveDivision.apply(Grid.open(9, 7), new SeededRandom(90));
    expect(linkChecksum(a)).toBe(linkChecksum(b));
  });
});
