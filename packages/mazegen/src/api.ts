/**
 * Generation API
 *
 * High-level entry point for level builders: validate a config, carve a
 * maze from its seed, and place entrance, exit and dead-end features.
 */

import {
  type MazeAlgorithmId,
  type MazeConfig,
  type MazeConfigInput,
  MazeError,
  parseMazeConfig,
  Result,
  resolveSeed,
  SeededRandom,
} from "@delve/contracts";
import {
  type AnyMazeAlgorithm,
  applyAlgorithm,
  createGridFor,
  getAlgorithm,
  getAvailableAlgorithms,
  type LongestPathResult,
  randomAlgorithm,
} from "./algorithms";
import type { Cell, Grid } from "./core/grid";
import { linkChecksum } from "./core/hash/checksum";
import { placeDeadEndFeatures, placeEntranceExit } from "./level/placement";
import {
  DefaultTraceCollector,
  NoopTraceCollector,
  type TraceCollector,
  type TraceEvent,
  traced,
} from "./trace";
import { validateMaze, type Violation } from "./validation/invariant-checks";

/**
 * A generated level layout.
 */
export interface MazeArtifact {
  readonly grid: Grid;
  readonly algorithm: MazeAlgorithmId;
  /** The uint32 the RNG was seeded with. */
  readonly seed: number;
  readonly entrance: Cell;
  readonly exit: Cell;
  /** Longest path, entrance to exit. */
  readonly path: readonly Cell[];
  readonly deadEnds: readonly Cell[];
  /** Dead ends that received a feature marker. */
  readonly features: readonly Cell[];
  readonly checksum: string;
  /** Non-fatal invariant findings, such as cycles left by division rooms. */
  readonly warnings: readonly Violation[];
  readonly trace: readonly TraceEvent[];
}

export interface GenerateOptions {
  /**
   * `true` records events in a fresh collector; pass a collector to
   * reuse one. Default: no tracing.
   */
  readonly trace?: boolean | TraceCollector;
}

function resolveTrace(option: GenerateOptions["trace"]): TraceCollector {
  if (option === true) return new DefaultTraceCollector(true);
  if (option === undefined || option === false) return new NoopTraceCollector();
  return option;
}

function selectAlgorithm(
  config: MazeConfig,
  rng: SeededRandom,
  trace: TraceCollector,
): AnyMazeAlgorithm {
  if (config.algorithm) {
    const algorithm = getAlgorithm(config.algorithm, { division: config.division }).getOrThrow();
    trace.decision(
      "algorithm",
      "Which algorithm carves the grid?",
      getAvailableAlgorithms(),
      algorithm.id,
      "Requested by config",
    );
    return algorithm;
  }

  const algorithm = randomAlgorithm(rng);
  trace.decision(
    "algorithm",
    "Which algorithm carves the grid?",
    getAvailableAlgorithms(),
    algorithm.id,
    "Drawn from the seeded RNG",
  );
  return algorithm;
}

function describeCell(cell: Cell): { row: number; column: number } {
  return { row: cell.row, column: cell.column };
}

function build(config: MazeConfig, trace: TraceCollector): MazeArtifact {
  const seed = resolveSeed(config.seed);
  const rng = new SeededRandom(seed);
  const algorithm = selectAlgorithm(config, rng, trace);

  const grid = traced(trace, "grid", () =>
    createGridFor(algorithm, config.rows, config.columns),
  );
  traced(trace, "carve", () => applyAlgorithm(algorithm, grid, rng).getOrThrow());

  const longest: LongestPathResult = traced(trace, "longest-path", () =>
    placeEntranceExit(grid, rng),
  );
  trace.decision(
    "longest-path",
    "Where do the entrance and exit go?",
    [],
    { entrance: describeCell(longest.start), exit: describeCell(longest.goal) },
    `Ends of a ${longest.distance}-passage longest path`,
  );

  const deadEnds = grid.deadEnds();
  const features = traced(trace, "features", () =>
    placeDeadEndFeatures(grid, rng, config.deadEndFeatures, [longest.start, longest.goal]),
  );
  if (features.shortfall > 0) {
    trace.warning(
      "features",
      `Placed ${features.placed.length} of ${config.deadEndFeatures} dead-end features`,
    );
  }
  if (features.placed.length > 0) {
    trace.decision(
      "features",
      "Which dead ends hold features?",
      deadEnds.map(describeCell),
      features.placed.map(describeCell),
      "Shuffled dead ends, entrance and exit excluded",
    );
  }

  const validation = validateMaze(grid, { requirePerfect: algorithm.perfect });
  if (!validation.success) {
    throw MazeError.generationFailed(`${algorithm.id} produced an invalid maze`, {
      violations: validation.violations,
    });
  }
  for (const violation of validation.violations) {
    trace.warning("validation", violation.message);
  }

  return {
    grid,
    algorithm: algorithm.id,
    seed,
    entrance: longest.start,
    exit: longest.goal,
    path: longest.path,
    deadEnds,
    features: features.placed,
    checksum: linkChecksum(grid),
    warnings: validation.violations,
    trace: trace.getEvents(),
  };
}

/**
 * Generate a maze level from raw config.
 *
 * Never throws: invalid config, a grid-state mismatch and failed
 * invariants all come back as an Err.
 *
 * @example
 * ```typescript
 * const result = generateMaze({ rows: 12, columns: 16, seed: "crypt-of-ash" });
 * if (result.isOk()) {
 *   const { entrance, exit } = result.value;
 * }
 * ```
 */
export function generateMaze(
  input: MazeConfigInput,
  options: GenerateOptions = {},
): Result<MazeArtifact, MazeError> {
  const trace = resolveTrace(options.trace);

  return parseMazeConfig(input).flatMap((config) =>
    Result.fromThrowable(
      () => build(config, trace),
      (error) =>
        MazeError.isMazeError(error)
          ? error
          : MazeError.generationFailed(error instanceof Error ? error.message : String(error)),
    ),
  );
}
