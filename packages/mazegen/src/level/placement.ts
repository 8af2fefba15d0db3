/**
 * Entrance, exit and dead-end feature placement on a carved grid.
 */

import type { RandomSource } from "@delve/contracts";
import { findLongestPath, type LongestPathResult } from "../algorithms/longest-path";
import type { Cell, Grid } from "../core/grid";
import { TileType } from "./tiles";

/**
 * Put the entrance and exit at the two ends of the longest path.
 * The exit marker wins on a single-cell grid, where both ends coincide.
 */
export function placeEntranceExit(
  grid: Grid,
  rng: RandomSource,
  markers: { readonly entrance: TileType; readonly exit: TileType } = {
    entrance: TileType.PLAYER,
    exit: TileType.STAIRS,
  },
): LongestPathResult {
  const longest = findLongestPath(grid, rng);
  longest.start.tile = markers.entrance;
  longest.goal.tile = markers.exit;
  return longest;
}

export interface FeaturePlacement {
  /** Cells that received the marker, in the order they were drawn. */
  readonly placed: Cell[];
  /** Requested count that could not be honoured for lack of dead ends. */
  readonly shortfall: number;
}

/**
 * Mark up to `count` random dead ends, skipping cells in `exclude`.
 */
export function placeDeadEndFeatures(
  grid: Grid,
  rng: RandomSource,
  count: number,
  exclude: readonly Cell[] = [],
  marker: TileType = TileType.GOLD,
): FeaturePlacement {
  if (count <= 0) return { placed: [], shortfall: 0 };

  const excluded = new Set(exclude);
  const candidates = grid.deadEnds().filter((cell) => !excluded.has(cell));
  const placed = rng.shuffle(candidates).slice(0, count);

  for (const cell of placed) {
    cell.tile = marker;
  }

  return { placed, shortfall: count - placed.length };
}
