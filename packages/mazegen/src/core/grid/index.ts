export { Cell } from "./cell";
export { Grid } from "./grid";
export {
  DEFAULT_TILE,
  DIRECTION_OFFSETS,
  DIRECTIONS,
  type Direction,
  type GridState,
  NO_NEIGHBOR,
  type Tile,
} from "./types";
