/**
 * A single node of the maze lattice.
 */

import { computeDistances, type Distances } from "../distances/distances";
import type { Grid } from "./grid";
import { DEFAULT_TILE, DIRECTIONS, type Direction, type Tile } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Cell with fixed adjacency and mutable link state.
 *
 * Adjacency is resolved through the owning grid's index table, so a cell
 * never holds references to its neighbours. Links are stored as neighbour
 * indices.
 *
 * @example
 * ```typescript
 * const grid = Grid.closed(3, 3);
 * const cell = grid.at(1, 1);
 * cell?.link(cell.north);
 * cell?.isLinked(cell.north); // true
 * ```
 */
export class Cell {
  /** Free-form marker written by level builders. */
  tile: Tile = DEFAULT_TILE;

  private readonly linked = new Set<number>();

  constructor(
    readonly grid: Grid,
    readonly row: number,
    readonly column: number,
    readonly index: number,
  ) {}

  get north(): Cell | undefined {
    return this.grid.neighborOf(this.index, "north");
  }

  get south(): Cell | undefined {
    return this.grid.neighborOf(this.index, "south");
  }

  get east(): Cell | undefined {
    return this.grid.neighborOf(this.index, "east");
  }

  get west(): Cell | undefined {
    return this.grid.neighborOf(this.index, "west");
  }

  neighborIn(direction: Direction): Cell | undefined {
    return this.grid.neighborOf(this.index, direction);
  }

  /**
   * Physically adjacent cells in north, south, east, west order,
   * whatever their link state.
   */
  neighbors(): Cell[] {
    const result: Cell[] = [];
    for (const direction of DIRECTIONS) {
      const neighbor = this.grid.neighborOf(this.index, direction);
      if (neighbor) result.push(neighbor);
    }
    return result;
  }

  isAdjacentTo(other: Cell): boolean {
    if (other.grid !== this.grid) return false;
    for (const direction of DIRECTIONS) {
      if (this.grid.neighborOf(this.index, direction) === other) return true;
    }
    return false;
  }

  /**
   * Open a passage towards `other`.
   *
   * Absent neighbours are ignored. Returns whether a link was recorded.
   */
  link(other: Cell | null | undefined, bidirectional = true): boolean {
    if (!other) return false;
    if (!this.isAdjacentTo(other)) {
      if (DEV_MODE) {
        console.warn(
          `Cell.link: (${other.row}, ${other.column}) is not adjacent to (${this.row}, ${this.column})`,
        );
      }
      return false;
    }

    this.linked.add(other.index);
    if (bidirectional) {
      other.linked.add(this.index);
    }
    return true;
  }

  /**
   * Close the passage towards `other`. Returns whether a link was removed.
   */
  unlink(other: Cell | null | undefined, bidirectional = true): boolean {
    if (!other || other.grid !== this.grid) return false;

    let removed = this.linked.delete(other.index);
    if (bidirectional) {
      removed = other.linked.delete(this.index) || removed;
    }
    return removed;
  }

  isLinked(other: Cell | null | undefined): boolean {
    if (!other || other.grid !== this.grid) return false;
    return this.linked.has(other.index);
  }

  /**
   * Cells this cell has a passage to, in neighbour order.
   */
  links(): Cell[] {
    if (this.linked.size === 0) return [];
    return this.neighbors().filter((neighbor) => this.linked.has(neighbor.index));
  }

  get linkCount(): number {
    return this.linked.size;
  }

  isDeadEnd(): boolean {
    return this.linked.size === 1;
  }

  /**
   * Hop distances from this cell over the current links.
   */
  distances(): Distances {
    return computeDistances(this.grid, this);
  }
}
