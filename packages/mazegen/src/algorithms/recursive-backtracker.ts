import type { RandomSource } from "@delve/contracts";
import type { Cell, Grid } from "../core/grid";
import { assertInitialState, type MazeAlgorithm } from "./types";

/**
 * Recursive Backtracker (randomized depth-first search).
 *
 * Carves forward into a random unvisited neighbour and backs up when
 * boxed in. Long, winding corridors with few dead ends.
 */
export class RecursiveBacktracker implements MazeAlgorithm<"closed"> {
  readonly id = "recursive-backtracker";
  readonly name = "Recursive Backtracker";
  readonly description = "Depth-first carving with an explicit stack";
  readonly requires = "closed";
  readonly perfect = true;

  apply(grid: Grid<"closed">, rng: RandomSource): Grid<"closed"> {
    assertInitialState(this, grid);

    const visited = new Uint8Array(grid.size);
    const start = grid.randomCell(rng);
    visited[start.index] = 1;
    const stack: Cell[] = [start];

    while (stack.length > 0) {
      const current = stack[stack.length - 1];
      if (!current) break;

      const candidates = current
        .neighbors()
        .filter((neighbor) => visited[neighbor.index] === 0);
      const next = rng.choice(candidates);

      if (next) {
        current.link(next);
        visited[next.index] = 1;
        stack.push(next);
      } else {
        stack.pop();
      }
    }

    return grid;
  }
}

export const recursiveBacktracker = new RecursiveBacktracker();
