import type { RandomSource } from "@delve/contracts";
import type { Grid } from "../core/grid";
import { assertInitialState, type MazeAlgorithm } from "./types";

/**
 * Binary Tree maze generator.
 *
 * Each cell opens a passage north or east, chosen by a coin flip when
 * both exist. The top row and right column end up as unbroken corridors.
 * Runs in O(cells).
 */
export class BinaryTree implements MazeAlgorithm<"closed"> {
  readonly id = "binary-tree";
  readonly name = "Binary Tree";
  readonly description = "Links every cell to its north or east neighbour";
  readonly requires = "closed";
  readonly perfect = true;

  apply(grid: Grid<"closed">, rng: RandomSource): Grid<"closed"> {
    assertInitialState(this, grid);

    for (const cell of grid.eachCell()) {
      const { north, east } = cell;

      if (north && east) {
        cell.link(rng.probability(0.5) ? north : east);
      } else if (north) {
        cell.link(north);
      } else if (east) {
        cell.link(east);
      }
    }

    return grid;
  }
}

export const binaryTree = new BinaryTree();
