/**
 * generateMaze end-to-end tests
 */

import { describe, expect, it } from "vitest";
import { MAZE_ALGORITHM_IDS, seedFromString } from "@delve/contracts";
import { generateMaze } from "../src/api";
import { TileType } from "../src/level/tiles";
import { DefaultTraceCollector } from "../src/trace";

describe("generateMaze", () => {
  it("marks the entrance and exit at the ends of the longest path", () => {
    const artifact = generateMaze({
      rows: 8,
      columns: 8,
      seed: 42,
      algorithm: "recursive-backtracker",
    }).getOrThrow();

    expect(artifact.algorithm).toBe("recursive-backtracker");
    expect(artifact.seed).toBe(42);
    expect(artifact.entrance.tile).toBe(TileType.PLAYER);
    expect(artifact.exit.tile).toBe(TileType.STAIRS);
    expect(artifact.path[0]).toBe(artifact.entrance);
    expect(artifact.path[artifact.path.length - 1]).toBe(artifact.exit);
    expect(artifact.grid.linkCount()).toBe(63);
    expect(artifact.warnings).toEqual([]);
    expect(artifact.trace).toEqual([]);
  });

  it("places gold in dead ends away from the entrance and exit", () => {
    const artifact = generateMaze({
      rows: 10,
      columns: 10,
      seed: 7,
      algorithm: "binary-tree",
      deadEndFeatures: 3,
    }).getOrThrow();

    expect(artifact.features).toHaveLength(3);
    for (const cell of artifact.features) {
      expect(cell.tile).toBe(TileType.GOLD);
      expect(cell.isDeadEnd()).toBe(true);
      expect(cell).not.toBe(artifact.entrance);
      expect(cell).not.toBe(artifact.exit);
    }
  });

  it("warns when there are fewer dead ends than requested features", () => {
    const artifact = generateMaze(
      { rows: 6, columns: 6, seed: 3, algorithm: "aldous-broder", deadEndFeatures: 1000 },
      { trace: true },
    ).getOrThrow();

    // Both ends of a tree's longest path are dead ends
    expect(artifact.features).toHaveLength(artifact.deadEnds.length - 2);
    const warnings = artifact.trace.filter((event) => event.eventType === "warning");
    expect(warnings).toEqual([
      expect.objectContaining({
        stepId: "features",
        data: { message: `Placed ${artifact.features.length} of 1000 dead-end features` },
      }),
    ]);
  });

  it("returns config errors as Err", () => {
    const result = generateMaze({ rows: 0, columns: 4, seed: 1 });
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.message).toBe("Invalid maze config: rows: Dimensions must be at least 1");
  });

  it("is deterministic for a seed", () => {
    const config = { rows: 9, columns: 13, seed: 2024, deadEndFeatures: 4 };
    const a = generateMaze(config).getOrThrow();
    const b = generateMaze(config).getOrThrow();

    expect(a.algorithm).toBe(b.algorithm);
    expect(a.checksum).toBe(b.checksum);
    expect(a.entrance.index).toBe(b.entrance.index);
    expect(a.exit.index).toBe(b.exit.index);
    expect(a.features.map((cell) => cell.index)).toEqual(b.features.map((cell) => cell.index));
  });

  it("treats a named seed as its hash", () => {
    const named = generateMaze({ rows: 6, columns: 6, seed: "crypt-of-ash" }).getOrThrow();
    const numeric = generateMaze({
      rows: 6,
      columns: 6,
      seed: seedFromString("crypt-of-ash"),
    }).getOrThrow();

    expect(named.seed).toBe(seedFromString("crypt-of-ash"));
    expect(named.checksum).toBe(numeric.checksum);
  });

  it("draws an algorithm from the seed when none is configured", () => {
    const artifact = generateMaze({ rows: 5, columns: 5, seed: 11 }, { trace: true }).getOrThrow();

    expect(MAZE_ALGORITHM_IDS).toContain(artifact.algorithm);
    expect(artifact.trace[0]).toEqual(
      expect.objectContaining({
        stepId: "algorithm",
        eventType: "decision",
        data: expect.objectContaining({
          chosen: artifact.algorithm,
          reason: "Drawn from the seeded RNG",
        }),
      }),
    );
  });

  it("traces each generation step", () => {
    const artifact = generateMaze(
      { rows: 5, columns: 5, seed: 11, algorithm: "binary-tree" },
      { trace: true },
    ).getOrThrow();

    const started = artifact.trace
      .filter((event) => event.eventType === "start")
      .map((event) => event.stepId);
    expect(started).toEqual(["grid", "carve", "longest-path", "features"]);
  });

  it("records into a caller-supplied collector", () => {
    const trace = new DefaultTraceCollector(true);
    generateMaze({ rows: 3, columns: 3, seed: 1, algorithm: "binary-tree" }, { trace }).getOrThrow();
    expect(trace.getEvents().length).toBeGreaterThan(0);
  });

  it("handles a single-cell grid", () => {
    const artifact = generateMaze({ rows: 1, columns: 1, seed: 0, deadEndFeatures: 2 }).getOrThrow();

    expect(artifact.entrance).toBe(artifact.exit);
    expect(artifact.exit.tile).toBe(TileType.STAIRS);
    expect(artifact.path).toEqual([artifact.exit]);
    expect(artifact.deadEnds).toEqual([]);
    expect(artifact.features).toEqual([]);
  });

  it("reports division rooms as warnings", () => {
    const artifact = generateMaze({
      rows: 4,
      columns: 4,
      seed: 5,
      algorithm: "recursive-division",
      division: { roomSize: 5, roomChance: 1 },
    }).getOrThrow();

    expect(artifact.grid.linkCount()).toBe(21);
    expect(artifact.warnings).toEqual([
      {
        type: "invariant.perfect",
        message: "Expected 15 passages, found 21: 6 extra passage(s) form cycles",
        severity: "warning",
      },
    ]);
  });

  it("never returns a fully open grid from division rooms", () => {
    for (const seed of [1, 2, 3]) {
      const { grid } = generateMaze({
        rows: 4,
        columns: 4,
        seed,
        algorithm: "recursive-division",
        division: { roomSize: 5, roomChance: 1 },
      }).getOrThrow();

      expect(grid.matchesState("open")).toBe(false);
      expect(grid.matchesState("closed")).toBe(false);
    }
  });
});
