/**
 * Longest path (tree diameter) by two breadth-first passes.
 *
 * In a tree, the farthest cell from any cell is an endpoint of some
 * longest path. A second pass from that endpoint reaches the other end.
 * On a grid with cycles the result is still a valid shortest path
 * between two far-apart cells, just not guaranteed to be the longest.
 */

import type { RandomSource } from "@delve/contracts";
import { computeDistances } from "../core/distances";
import type { Cell, Grid } from "../core/grid";

export interface LongestPathOptions {
  /** First-pass root. Defaults to a random cell drawn from `rng`. */
  readonly start?: Cell;
}

export interface LongestPathResult {
  /** One end of the path; the farthest cell from the first-pass root. */
  readonly start: Cell;
  /** The other end; the farthest cell from `start`. */
  readonly goal: Cell;
  /** Passages between `start` and `goal`. */
  readonly distance: number;
  /** Cells from `start` to `goal`, both included. */
  readonly path: Cell[];
}

export function findLongestPath(
  grid: Grid,
  rng: RandomSource,
  options: LongestPathOptions = {},
): LongestPathResult {
  const root = options.start ?? grid.randomCell(rng);

  const first = computeDistances(grid, root).max();
  const second = computeDistances(grid, first.cell);
  const farthest = second.max();

  return {
    start: first.cell,
    goal: farthest.cell,
    distance: farthest.distance,
    path: second.pathTo(farthest.cell),
  };
}

export const LongestPath = {
  apply: findLongestPath,
} as const;
