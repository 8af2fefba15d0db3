/**
 * Algorithm registry and grid-state aware application.
 */

import {
  type DivisionOptions,
  type MazeAlgorithmId,
  MazeAlgorithmIdSchema,
  MazeError,
  type RandomSource,
  Result,
} from "@delve/contracts";
import { Grid } from "../core/grid";
import { aldousBroder } from "./aldous-broder";
import { binaryTree } from "./binary-tree";
import { recursiveBacktracker } from "./recursive-backtracker";
import { createRecursiveDivision, recursiveDivision } from "./recursive-division";
import { type AnyMazeAlgorithm, assertInitialState, type MazeAlgorithm } from "./types";

const algorithms = {
  "binary-tree": binaryTree,
  "aldous-broder": aldousBroder,
  "recursive-backtracker": recursiveBacktracker,
  "recursive-division": recursiveDivision,
} satisfies Record<MazeAlgorithmId, AnyMazeAlgorithm>;

const available: readonly [AnyMazeAlgorithm, ...AnyMazeAlgorithm[]] = [
  binaryTree,
  aldousBroder,
  recursiveBacktracker,
  recursiveDivision,
];

export interface AlgorithmOptions {
  /** Room settings, used only by recursive-division. */
  readonly division?: DivisionOptions;
}

/**
 * Look up an algorithm by id.
 */
export function getAlgorithm(
  id: string,
  options: AlgorithmOptions = {},
): Result<AnyMazeAlgorithm, MazeError> {
  const parsed = MazeAlgorithmIdSchema.safeParse(id);
  if (!parsed.success) {
    return Result.err(MazeError.algorithmNotFound(id));
  }
  if (parsed.data === "recursive-division" && options.division) {
    return Result.ok(createRecursiveDivision(options.division));
  }
  return Result.ok(algorithms[parsed.data]);
}

export function getAvailableAlgorithms(): MazeAlgorithmId[] {
  return available.map((algorithm) => algorithm.id);
}

/**
 * Uniform pick among the registered algorithms. Consumes one RNG value.
 */
export function randomAlgorithm(rng: RandomSource): AnyMazeAlgorithm {
  return rng.choice(available);
}

/**
 * Build a grid in the state `algorithm` starts from.
 */
export function createGridFor<S extends "closed" | "open">(
  algorithm: Pick<MazeAlgorithm<S>, "requires">,
  rows: number,
  columns: number,
): Grid<S> {
  return Grid.create(algorithm.requires, rows, columns);
}

/**
 * Apply `algorithm` to `grid`, reporting a state mismatch as an Err
 * instead of throwing.
 */
export function applyAlgorithm(
  algorithm: AnyMazeAlgorithm,
  grid: Grid,
  rng: RandomSource,
): Result<Grid, MazeError> {
  return Result.fromThrowable(
    () => {
      if (algorithm.requires === "closed" && grid.hasState("closed")) {
        return algorithm.apply(grid, rng);
      }
      if (algorithm.requires === "open" && grid.hasState("open")) {
        return algorithm.apply(grid, rng);
      }
      assertInitialState(algorithm, grid);
      return grid;
    },
    (error) =>
      MazeError.isMazeError(error)
        ? error
        : MazeError.generationFailed(String(error), { algorithm: algorithm.id }),
  );
}
