/**
 * Error codes for maze generation and analysis.
 */
export type MazeErrorCode =
  | "CONFIG_INVALID"
  | "GRID_DIMENSIONS_INVALID"
  | "GRID_STATE_MISMATCH"
  | "ALGORITHM_NOT_FOUND"
  | "GOAL_UNREACHABLE"
  | "CELL_NOT_IN_GRID"
  | "DISTANCES_STALE"
  | "GENERATION_FAILED";

/**
 * Unified error type for maze operations.
 *
 * Core operations throw it on a precondition violation; the generation
 * API hands it back inside a `Result` instead.
 *
 * @example
 * ```typescript
 * throw MazeError.stateMismatch("recursive-division needs an open grid", {
 *   required: "open",
 *   actual: "closed",
 * });
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static dimensionsInvalid(rows: number, columns: number): MazeError {
    return new MazeError(
      "GRID_DIMENSIONS_INVALID",
      `Invalid grid dimensions: ${rows}x${columns}`,
      { rows, columns },
    );
  }

  static stateMismatch(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("GRID_STATE_MISMATCH", message, details);
  }

  static algorithmNotFound(id: string): MazeError {
    return new MazeError("ALGORITHM_NOT_FOUND", `Unknown algorithm: ${id}`, { id });
  }

  static goalUnreachable(row: number, column: number): MazeError {
    return new MazeError(
      "GOAL_UNREACHABLE",
      `Cell (${row}, ${column}) is not reachable from the distance root`,
      { row, column },
    );
  }

  static cellNotInGrid(row: number, column: number): MazeError {
    return new MazeError(
      "CELL_NOT_IN_GRID",
      `Cell (${row}, ${column}) does not belong to this grid`,
      { row, column },
    );
  }

  static generationFailed(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("GENERATION_FAILED", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
