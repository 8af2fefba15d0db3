import type { DivisionOptions, RandomSource } from "@delve/contracts";
import type { Grid } from "../core/grid";
import { assertInitialState, type MazeAlgorithm } from "./types";

/**
 * Rectangular region of the grid, in cell units.
 */
interface Region {
  readonly row: number;
  readonly column: number;
  readonly height: number;
  readonly width: number;
}

/**
 * Recursive Division maze generator.
 *
 * Starts from an open grid and raises walls: each region is split along
 * its longer axis (a coin flip when square) by a wall with one gap, then
 * both halves are divided again until they are one cell thick.
 *
 * With `rooms` set, a region smaller than `roomSize` on both axes stops
 * dividing with probability `roomChance`, leaving an open room. Rooms
 * contain cycles, so the result is no longer a perfect maze. The whole
 * grid is always split at least once.
 */
export class RecursiveDivision implements MazeAlgorithm<"open"> {
  readonly id = "recursive-division";
  readonly name = "Recursive Division";
  readonly description = "Splits an open grid with walls, leaving one gap per wall";
  readonly requires = "open";
  readonly perfect: boolean;

  constructor(private readonly rooms?: DivisionOptions) {
    this.perfect = !rooms || rooms.roomChance === 0;
  }

  apply(grid: Grid<"open">, rng: RandomSource): Grid<"open"> {
    assertInitialState(this, grid);
    this.divide(grid, rng, { row: 0, column: 0, height: grid.rows, width: grid.columns }, true);
    return grid;
  }

  private divide(grid: Grid, rng: RandomSource, region: Region, root = false): void {
    const { height, width } = region;
    if (height <= 1 || width <= 1) return;

    if (
      !root &&
      this.rooms &&
      height < this.rooms.roomSize &&
      width < this.rooms.roomSize &&
      rng.probability(this.rooms.roomChance)
    ) {
      return;
    }

    const horizontal = height > width || (height === width && rng.probability(0.5));
    if (horizontal) {
      this.divideHorizontally(grid, rng, region);
    } else {
      this.divideVertically(grid, rng, region);
    }
  }

  /** Wall runs east-west below row `row + divideSouthOf`. */
  private divideHorizontally(grid: Grid, rng: RandomSource, region: Region): void {
    const { row, column, height, width } = region;
    const divideSouthOf = rng.range(0, height - 2);
    const passageAt = rng.range(0, width - 1);

    for (let x = 0; x < width; x++) {
      if (x === passageAt) continue;
      const cell = grid.at(row + divideSouthOf, column + x);
      cell?.unlink(cell.south);
    }

    this.divide(grid, rng, { row, column, height: divideSouthOf + 1, width });
    this.divide(grid, rng, {
      row: row + divideSouthOf + 1,
      column,
      height: height - divideSouthOf - 1,
      width,
    });
  }

  /** Wall runs north-south east of column `column + divideEastOf`. */
  private divideVertically(grid: Grid, rng: RandomSource, region: Region): void {
    const { row, column, height, width } = region;
    const divideEastOf = rng.range(0, width - 2);
    const passageAt = rng.range(0, height - 1);

    for (let y = 0; y < height; y++) {
      if (y === passageAt) continue;
      const cell = grid.at(row + y, column + divideEastOf);
      cell?.unlink(cell.east);
    }

    this.divide(grid, rng, { row, column, height, width: divideEastOf + 1 });
    this.divide(grid, rng, {
      row,
      column: column + divideEastOf + 1,
      height,
      width: width - divideEastOf - 1,
    });
  }
}

export function createRecursiveDivision(rooms?: DivisionOptions): RecursiveDivision {
  return new RecursiveDivision(rooms);
}

export const recursiveDivision = new RecursiveDivision();
