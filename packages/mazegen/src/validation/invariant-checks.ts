/**
 * Maze Validation Invariants
 *
 * Reusable checks over a grid's link graph.
 */

import { computeDistances } from "../core/distances";
import type { Grid } from "../core/grid";

export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

/**
 * Validation result for a single check
 */
export interface CheckResult {
  readonly success: boolean;
  readonly violations: Violation[];
}

export interface MazeValidationResult {
  /** False when at least one error-level violation was found. */
  readonly success: boolean;
  readonly violations: readonly Violation[];
}

export interface ValidateMazeOptions {
  /** Report cycles as errors instead of warnings. */
  readonly requirePerfect?: boolean;
}

const PASS: CheckResult = { success: true, violations: [] };

/**
 * Every link must have its reverse.
 */
export function checkLinkSymmetry(grid: Grid): CheckResult {
  const violations: Violation[] = [];

  for (const cell of grid.eachCell()) {
    for (const neighbor of cell.neighbors()) {
      if (cell.isLinked(neighbor) && !neighbor.isLinked(cell)) {
        violations.push({
          type: "invariant.link-symmetry",
          message: `(${cell.row}, ${cell.column}) links to (${neighbor.row}, ${neighbor.column}) without a reverse link`,
          severity: "error",
        });
      }
    }
  }

  return violations.length === 0 ? PASS : { success: false, violations };
}

/**
 * Every cell must be reachable from the first cell.
 */
export function checkConnectivity(grid: Grid): CheckResult {
  const origin = grid.at(0, 0);
  if (!origin) return PASS;

  const reached = computeDistances(grid, origin).size;
  if (reached === grid.size) return PASS;

  return {
    success: false,
    violations: [
      {
        type: "invariant.connectivity",
        message: `Only ${reached} of ${grid.size} cells are reachable from (0, 0)`,
        severity: "error",
      },
    ],
  };
}

/**
 * A connected grid is a spanning tree exactly when it has `size - 1`
 * passages. Run {@link checkConnectivity} first; this check only counts.
 */
export function checkPerfect(
  grid: Grid,
  severity: Violation["severity"] = "warning",
): CheckResult {
  const passages = grid.linkCount();
  const expected = grid.size - 1;
  if (passages === expected) return PASS;

  const detail =
    passages > expected
      ? `${passages - expected} extra passage(s) form cycles`
      : `${expected - passages} passage(s) missing for a spanning tree`;

  return {
    success: severity !== "error",
    violations: [
      {
        type: "invariant.perfect",
        message: `Expected ${expected} passages, found ${passages}: ${detail}`,
        severity,
      },
    ],
  };
}

/**
 * Run all invariant checks.
 */
export function validateMaze(
  grid: Grid,
  options: ValidateMazeOptions = {},
): MazeValidationResult {
  const violations: Violation[] = [
    ...checkLinkSymmetry(grid).violations,
    ...checkConnectivity(grid).violations,
    ...checkPerfect(grid, options.requirePerfect ? "error" : "warning").violations,
  ];

  return {
    success: !violations.some((v) => v.severity === "error"),
    violations,
  };
}
