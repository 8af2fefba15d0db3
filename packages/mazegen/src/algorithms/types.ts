/**
 * Maze algorithm contract.
 */

import { type MazeAlgorithmId, MazeError, type RandomSource } from "@delve/contracts";
import type { Grid, GridState } from "../core/grid";

/**
 * A carving strategy that mutates a grid's links in place.
 *
 * `requires` names the state the grid must be built in; `apply` only
 * accepts a grid of that state, and also checks at run time that the
 * grid has not been carved already.
 */
export interface MazeAlgorithm<S extends GridState = GridState> {
  readonly id: MazeAlgorithmId;
  readonly name: string;
  readonly description: string;
  readonly requires: S;
  /** Whether the result is always a spanning tree (no cycles). */
  readonly perfect: boolean;
  apply(grid: Grid<S>, rng: RandomSource): Grid<S>;
}

/**
 * Any registered algorithm, discriminated by `requires`.
 */
export type AnyMazeAlgorithm = MazeAlgorithm<"closed"> | MazeAlgorithm<"open">;

/**
 * Reject a grid whose declared or current link state does not match what
 * the algorithm starts from.
 *
 * @throws {MazeError} GRID_STATE_MISMATCH
 */
export function assertInitialState(
  algorithm: Pick<MazeAlgorithm, "id" | "requires">,
  grid: Grid,
): void {
  if (grid.state !== algorithm.requires) {
    const article = algorithm.requires === "open" ? "an" : "a";
    throw MazeError.stateMismatch(
      `${algorithm.id} requires ${article} ${algorithm.requires} grid, got ${grid.state}`,
      { algorithm: algorithm.id, required: algorithm.requires, actual: grid.state },
    );
  }
  if (!grid.matchesState(algorithm.requires)) {
    throw MazeError.stateMismatch(
      `${algorithm.id} requires an uncarved ${algorithm.requires} grid`,
      { algorithm: algorithm.id, required: algorithm.requires, actual: "carved" },
    );
  }
}
