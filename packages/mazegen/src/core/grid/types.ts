/**
 * Grid types for maze generation.
 */

/**
 * Initial link state of a freshly built grid.
 *
 * - `closed`: every cell walled off from its neighbours (no links)
 * - `open`: every physically adjacent pair already linked
 */
export type GridState = "closed" | "open";

export type Direction = "north" | "south" | "east" | "west";

/**
 * Neighbour order used everywhere a cell's neighbours are listed.
 */
export const DIRECTIONS: readonly Direction[] = ["north", "south", "east", "west"];

/**
 * Row/column offsets per direction.
 */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, readonly [number, number]>> = {
  north: [-1, 0],
  south: [1, 0],
  east: [0, 1],
  west: [0, -1],
};

/**
 * Slot value in the adjacency table for a missing neighbour.
 */
export const NO_NEIGHBOR = -1;

/**
 * Opaque marker stored on a cell. The grid never interprets it.
 */
export type Tile = string;

export const DEFAULT_TILE: Tile = " ";
