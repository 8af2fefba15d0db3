/**
 * Tile markers written by the level builder.
 *
 * The grid stores tiles without reading them; these values only matter to
 * collaborators that draw the level or place entities on it.
 */
export const TileType = {
  EMPTY: " ",
  WALL: "#",
  DOOR: "/",
  FLOOR: ".",
  PLAYER: "@",
  MONSTER: "M",
  STAIRS: "%",
  VERTICAL_WALL: "|",
  GOLD: "$",
} as const;

export type TileType = (typeof TileType)[keyof typeof TileType];

const TILE_VALUES: ReadonlySet<string> = new Set(Object.values(TileType));

const WALKABLE: ReadonlySet<string> = new Set<TileType>([
  TileType.EMPTY,
  TileType.FLOOR,
  TileType.DOOR,
  TileType.PLAYER,
  TileType.MONSTER,
  TileType.STAIRS,
  TileType.GOLD,
]);

const WALLS: ReadonlySet<string> = new Set<TileType>([TileType.WALL, TileType.VERTICAL_WALL]);

export function isTileType(tile: string): tile is TileType {
  return TILE_VALUES.has(tile);
}

export function isWalkableTile(tile: string): boolean {
  return WALKABLE.has(tile);
}

export function isWallTile(tile: string): boolean {
  return WALLS.has(tile);
}
