export {
  computeDistances,
  Distances,
  type FarthestCell,
  pathTo,
  shortestPath,
} from "./distances";
