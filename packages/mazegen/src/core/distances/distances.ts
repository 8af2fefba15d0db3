/**
 * Hop distances over a grid's link graph.
 *
 * Every passage has the same cost, so a breadth-first traversal yields
 * exact shortest distances; no priority queue is involved.
 */

import { MazeError } from "@delve/contracts";
import type { Cell } from "../grid/cell";
import type { Grid } from "../grid/grid";

/**
 * Farthest cell found in a distance map.
 */
export interface FarthestCell {
  readonly cell: Cell;
  readonly distance: number;
}

/**
 * Snapshot of hop counts from a root cell.
 *
 * Cells that were unreachable when the snapshot was taken are absent.
 * Later link changes are not reflected.
 */
export class Distances {
  private readonly hops = new Map<number, number>();

  private constructor(
    readonly grid: Grid,
    readonly root: Cell,
  ) {
    this.hops.set(root.index, 0);
  }

  /**
   * Breadth-first traversal from `start` following outgoing links.
   */
  static compute(grid: Grid, start: Cell): Distances {
    if (start.grid !== grid) {
      throw MazeError.cellNotInGrid(start.row, start.column);
    }

    const result = new Distances(grid, start);
    const queue: Cell[] = [start];
    let head = 0;

    while (head < queue.length) {
      const current = queue[head++];
      if (!current) break;
      const nextDistance = (result.hops.get(current.index) ?? 0) + 1;

      for (const neighbor of current.links()) {
        if (!result.hops.has(neighbor.index)) {
          result.hops.set(neighbor.index, nextDistance);
          queue.push(neighbor);
        }
      }
    }

    return result;
  }

  get(cell: Cell): number | undefined {
    if (cell.grid !== this.grid) return undefined;
    return this.hops.get(cell.index);
  }

  has(cell: Cell): boolean {
    return this.get(cell) !== undefined;
  }

  /** Number of reached cells, root included. */
  get size(): number {
    return this.hops.size;
  }

  /**
   * Reached cells in discovery order.
   */
  cells(): Cell[] {
    return this.entries().map(([cell]) => cell);
  }

  entries(): Array<[Cell, number]> {
    const result: Array<[Cell, number]> = [];
    for (const [index, distance] of this.hops) {
      const cell = this.grid.cellAt(index);
      if (cell) result.push([cell, distance]);
    }
    return result;
  }

  /**
   * Farthest reached cell. Ties go to the first cell in row-major order.
   */
  max(): FarthestCell {
    let best: FarthestCell = { cell: this.root, distance: 0 };
    for (const cell of this.grid.eachCell()) {
      const distance = this.hops.get(cell.index);
      if (distance !== undefined && distance > best.distance) {
        best = { cell, distance };
      }
    }
    return best;
  }

  /**
   * Shortest path from the root to `goal`, both ends included.
   *
   * Walks back from `goal`, each step moving to a neighbour that links
   * into the current cell and sits exactly one hop closer to the root.
   *
   * @throws {MazeError} GOAL_UNREACHABLE when `goal` is not in the map
   * @throws {MazeError} DISTANCES_STALE when links changed since the snapshot
   */
  pathTo(goal: Cell): Cell[] {
    const goalDistance = this.get(goal);
    if (goalDistance === undefined) {
      throw MazeError.goalUnreachable(goal.row, goal.column);
    }

    const path: Cell[] = [goal];
    let current = goal;
    let distance = goalDistance;

    while (distance > 0) {
      const step = distance - 1;
      const previous = current
        .neighbors()
        .find((neighbor) => neighbor.isLinked(current) && this.hops.get(neighbor.index) === step);

      if (!previous) {
        throw new MazeError(
          "DISTANCES_STALE",
          `No predecessor for (${current.row}, ${current.column}) at distance ${step}`,
          { row: current.row, column: current.column, distance },
        );
      }

      path.push(previous);
      current = previous;
      distance = step;
    }

    return path.reverse();
  }
}

export function computeDistances(grid: Grid, start: Cell): Distances {
  return Distances.compute(grid, start);
}

export function pathTo(distances: Distances, goal: Cell): Cell[] {
  return distances.pathTo(goal);
}

/**
 * Cells from `start` to `goal` along the fewest passages.
 *
 * @throws {MazeError} GOAL_UNREACHABLE when no passage route exists
 */
export function shortestPath(grid: Grid, start: Cell, goal: Cell): Cell[] {
  return Distances.compute(grid, start).pathTo(goal);
}
