import { describe, expect, it } from "vitest";
import { MazeError } from "../src";

describe("MazeError", () => {
  it("carries code, message and details", () => {
    const error = MazeError.dimensionsInvalid(0, 4);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MazeError");
    expect(error.code).toBe("GRID_DIMENSIONS_INVALID");
    expect(error.message).toBe("Invalid grid dimensions: 0x4");
    expect(error.details).toEqual({ rows: 0, columns: 4 });
  });

  it("serializes without empty details", () => {
    expect(MazeError.algorithmNotFound("prim").toJSON()).toEqual({
      name: "MazeError",
      code: "ALGORITHM_NOT_FOUND",
      message: "Unknown algorithm: prim",
      details: { id: "prim" },
    });
    expect(new MazeError("GENERATION_FAILED", "x").toJSON()).toEqual({
      name: "MazeError",
      code: "GENERATION_FAILED",
      message: "x",
    });
  });

  it("recognizes its own instances", () => {
    expect(MazeError.isMazeError(MazeError.goalUnreachable(1, 2))).toBe(true);
    expect(MazeError.isMazeError(new Error("plain"))).toBe(false);
  });
});
