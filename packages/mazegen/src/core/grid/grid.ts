/**
 * Rectangular maze grid.
 * Owns a flat, row-major arena of cells plus an Int32Array adjacency table.
 */

import { MazeError, type RandomSource } from "@delve/contracts";
import { Cell } from "./cell";
import {
  DIRECTION_OFFSETS,
  DIRECTIONS,
  type Direction,
  type GridState,
  NO_NEIGHBOR,
} from "./types";

const DIRECTION_SLOT: Readonly<Record<Direction, number>> = {
  north: 0,
  south: 1,
  east: 2,
  west: 3,
};

/**
 * Grid of `rows * columns` cells with immutable dimensions and adjacency.
 *
 * The type parameter records the state the grid was built in, so an
 * algorithm that needs an open grid rejects a closed one at compile time.
 * Build grids through {@link Grid.closed} or {@link Grid.open}.
 *
 * @remarks
 * Only link state and tiles change after construction. Cells are never
 * added or removed.
 */
export class Grid<S extends GridState = GridState> implements Iterable<Cell> {
  readonly rows: number;
  readonly columns: number;
  /** State the grid was constructed in. */
  readonly state: S;

  private readonly cells: Cell[];
  private readonly adjacency: Int32Array;

  private constructor(rows: number, columns: number, state: S) {
    if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows <= 0 || columns <= 0) {
      throw MazeError.dimensionsInvalid(rows, columns);
    }

    this.rows = rows;
    this.columns = columns;
    this.state = state;

    const size = rows * columns;
    this.cells = new Array<Cell>(size);
    for (let index = 0; index < size; index++) {
      this.cells[index] = new Cell(this, Math.floor(index / columns), index % columns, index);
    }

    this.adjacency = new Int32Array(size * 4).fill(NO_NEIGHBOR);
    for (let index = 0; index < size; index++) {
      const row = Math.floor(index / columns);
      const column = index % columns;
      for (const direction of DIRECTIONS) {
        const [dr, dc] = DIRECTION_OFFSETS[direction];
        const nr = row + dr;
        const nc = column + dc;
        if (nr >= 0 && nr < rows && nc >= 0 && nc < columns) {
          this.adjacency[index * 4 + DIRECTION_SLOT[direction]] = nr * columns + nc;
        }
      }
    }

    if (state === "open") {
      for (const cell of this.cells) {
        cell.link(cell.east);
        cell.link(cell.south);
      }
    }
  }

  /**
   * Grid with every cell walled off. Starting point for the passage-opening
   * algorithms.
   */
  static closed(rows: number, columns: number): Grid<"closed"> {
    return new Grid(rows, columns, "closed");
  }

  /**
   * Grid with every adjacent pair linked. Starting point for wall-carving
   * algorithms.
   */
  static open(rows: number, columns: number): Grid<"open"> {
    return new Grid(rows, columns, "open");
  }

  static create<T extends GridState>(state: T, rows: number, columns: number): Grid<T> {
    return new Grid(rows, columns, state);
  }

  get size(): number {
    return this.cells.length;
  }

  isInBounds(row: number, column: number): boolean {
    return row >= 0 && row < this.rows && column >= 0 && column < this.columns;
  }

  /**
   * Cell at (row, column), or undefined when out of range.
   */
  at(row: number, column: number): Cell | undefined {
    if (!Number.isInteger(row) || !Number.isInteger(column)) return undefined;
    if (!this.isInBounds(row, column)) return undefined;
    return this.cells[row * this.columns + column];
  }

  cellAt(index: number): Cell | undefined {
    return this.cells[index];
  }

  neighborOf(index: number, direction: Direction): Cell | undefined {
    const neighbor = this.adjacency[index * 4 + DIRECTION_SLOT[direction]];
    if (neighbor === undefined || neighbor === NO_NEIGHBOR) return undefined;
    return this.cells[neighbor];
  }

  /**
   * Row-major traversal. Each call starts a fresh iteration.
   */
  *eachCell(): IterableIterator<Cell> {
    for (const cell of this.cells) {
      yield cell;
    }
  }

  *eachRow(): IterableIterator<readonly Cell[]> {
    for (let row = 0; row < this.rows; row++) {
      yield this.cells.slice(row * this.columns, (row + 1) * this.columns);
    }
  }

  [Symbol.iterator](): IterableIterator<Cell> {
    return this.eachCell();
  }

  /**
   * Cells with exactly one link, row-major.
   */
  deadEnds(): Cell[] {
    return this.cells.filter((cell) => cell.isDeadEnd());
  }

  /**
   * Uniformly chosen cell. Consumes one value from `rng`.
   */
  randomCell(rng: RandomSource): Cell {
    const cell = this.cells[rng.range(0, this.cells.length - 1)];
    if (!cell) {
      throw new RangeError(`Random source produced an index outside a grid of ${this.size} cells`);
    }
    return cell;
  }

  /**
   * Adjacent pairs joined by a passage in either direction, each pair once,
   * ordered by the row-major index of its first cell (east before south).
   */
  *links(): IterableIterator<readonly [Cell, Cell]> {
    for (const cell of this.cells) {
      for (const neighbor of [cell.east, cell.south]) {
        if (neighbor && (cell.isLinked(neighbor) || neighbor.isLinked(cell))) {
          yield [cell, neighbor];
        }
      }
    }
  }

  linkCount(): number {
    let count = 0;
    for (const _ of this.links()) count++;
    return count;
  }

  /**
   * Whether the current link state equals the pristine `state`.
   */
  matchesState(state: GridState): boolean {
    if (state === "closed") {
      return this.cells.every((cell) => cell.linkCount === 0);
    }
    return this.cells.every((cell) =>
      cell.neighbors().every((neighbor) => cell.isLinked(neighbor)),
    );
  }

  hasState<T extends GridState>(state: T): this is Grid<T> {
    const current: GridState = this.state;
    return current === state;
  }
}
