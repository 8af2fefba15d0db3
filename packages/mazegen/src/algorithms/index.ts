export { AldousBroder, aldousBroder } from "./aldous-broder";
export { BinaryTree, binaryTree } from "./binary-tree";
export {
  findLongestPath,
  LongestPath,
  type LongestPathOptions,
  type LongestPathResult,
} from "./longest-path";
export { RecursiveBacktracker, recursiveBacktracker } from "./recursive-backtracker";
export {
  createRecursiveDivision,
  RecursiveDivision,
  recursiveDivision,
} from "./recursive-division";
export {
  type AlgorithmOptions,
  applyAlgorithm,
  createGridFor,
  getAlgorithm,
  getAvailableAlgorithms,
  randomAlgorithm,
} from "./registry";
export { type AnyMazeAlgorithm, assertInitialState, type MazeAlgorithm } from "./types";
