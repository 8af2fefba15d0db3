import { describe, expect, it } from "vitest";
import { isTileType, isWalkableTile, isWallTile, TileType } from "../src/level/tiles";

describe("TileType", () => {
  it("uses one glyph per marker", () => {
    const glyphs = Object.values(TileType);
    expect(new Set(glyphs).size).toBe(glyphs.length);
    expect(glyphs.every((glyph) => glyph.length === 1)).toBe(true);
  });
});

describe("isTileType", () => {
  it("accepts every marker and nothing else", () => {
    for (const tile of Object.values(TileType)) {
      expect(isTileType(tile)).toBe(true);
    }
    expect(isTileType("x")).toBe(false);
    expect(isTileType("")).toBe(false);
    expect(isTileType("##")).toBe(false);
  });
});

describe("isWalkableTile", () => {
  it("lets entities stand on floor, doors and markers", () => {
    for (const tile of [
      TileType.EMPTY,
      TileType.FLOOR,
      TileType.DOOR,
      TileType.PLAYER,
      TileType.MONSTER,
      TileType.STAIRS,
      TileType.GOLD,
    ]) {
      expect(isWalkableTile(tile)).toBe(true);
    }
  });

  it("blocks walls and unknown glyphs", () => {
    expect(isWalkableTile(TileType.WALL)).toBe(false);
    expect(isWalkableTile(TileType.VERTICAL_WALL)).toBe(false);
    expect(isWalkableTile("?")).toBe(false);
  });
});

describe("isWallTile", () => {
  it("recognises both wall glyphs", () => {
    expect(isWallTile(TileType.WALL)).toBe(true);
    expect(isWallTile(TileType.VERTICAL_WALL)).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isWallTile(TileType.DOOR)).toBe(false);
    expect(isWallTile(TileType.FLOOR)).toBe(false);
    expect(isWallTile(TileType.GOLD)).toBe(false);
  });
});
