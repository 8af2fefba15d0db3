import type { RandomSource } from "@delve/contracts";
import type { Grid } from "../core/grid";
import { assertInitialState, type MazeAlgorithm } from "./types";

/**
 * Aldous-Broder maze generator.
 *
 * A random walk over physical neighbours that opens a passage whenever it
 * steps into a cell it has not visited yet. Produces a uniform spanning
 * tree. Expected running time grows faster than the cell count, so keep
 * it to small and medium grids.
 */
export class AldousBroder implements MazeAlgorithm<"closed"> {
  readonly id = "aldous-broder";
  readonly name = "Aldous-Broder";
  readonly description = "Random walk that links each cell on first visit";
  readonly requires = "closed";
  readonly perfect = true;

  apply(grid: Grid<"closed">, rng: RandomSource): Grid<"closed"> {
    assertInitialState(this, grid);

    const visited = new Uint8Array(grid.size);
    let cell = grid.randomCell(rng);
    visited[cell.index] = 1;
    let unvisited = grid.size - 1;

    while (unvisited > 0) {
      const neighbor = rng.choice(cell.neighbors());
      if (!neighbor) break;

      if (visited[neighbor.index] === 0) {
        cell.link(neighbor);
        visited[neighbor.index] = 1;
        unvisited--;
      }

      cell = neighbor;
    }

    return grid;
  }
}

export const aldousBroder = new AldousBroder();
