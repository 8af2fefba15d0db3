/**
 * Maze generation and distance analysis for roguelike level layouts.
 *
 * @example
 * ```typescript
 * import { Grid, SeededRandom, binaryTree, findLongestPath } from "@delve/mazegen";
 *
 * const rng = new SeededRandom(42);
 * const grid = binaryTree.apply(Grid.closed(10, 10), rng);
 * const { start, goal, path } = findLongestPath(grid, rng);
 * console.log(`Stairs ${path.length - 1} steps from the entrance`);
 * ```
 */

export {
  type DivisionOptions,
  type MazeAlgorithmId,
  type MazeConfig,
  type MazeConfigInput,
  MazeError,
  type MazeErrorCode,
  parseMazeConfig,
  type RandomSource,
  Result,
  SeededRandom,
  seedFromString,
} from "@delve/contracts";
export * from "./algorithms";
export { type GenerateOptions, generateMaze, type MazeArtifact } from "./api";
export * from "./core/distances";
export * from "./core/grid";
export { FNV32Hasher, linkChecksum } from "./core/hash/checksum";
export {
  type FeaturePlacement,
  placeDeadEndFeatures,
  placeEntranceExit,
} from "./level/placement";
export { isTileType, isWalkableTile, isWallTile, TileType } from "./level/tiles";
export { assertDeterministic, DeterminismViolationError } from "./testing";
export {
  DefaultTraceCollector,
  NoopTraceCollector,
  type TraceCollector,
  type TraceEvent,
  type TraceEventType,
  traced,
} from "./trace";
export {
  type CheckResult,
  checkConnectivity,
  checkLinkSymmetry,
  checkPerfect,
  type MazeValidationResult,
  type ValidateMazeOptions,
  validateMaze,
  type Violation,
} from "./validation/invariant-checks";
