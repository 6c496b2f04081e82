import { describe, expect, it } from "vitest";
import {
  cloneGrid,
  createGrid,
  getTile,
  hasLineOfSight,
  isWalkable,
  listPositions,
  neighbors4,
  setTile,
  type GridWarning,
} from "../src/games/stealth/grid.js";
import { parseAsciiGrid } from "./helpers/asciiGrid.js";

describe("grid world", () => {
  it("starts as all floor", () => {
    const grid = createGrid(3, 2);
    expect(grid.tiles).toHaveLength(6);
    expect(grid.tiles.every((tile) => tile.kind === "floor")).toBe(true);
  });

  it("returns null outside the grid", () => {
    const grid = createGrid(3, 3);
    expect(getTile(grid, { x: -1, y: 0 })).toBeNull();
    expect(getTile(grid, { x: 3, y: 0 })).toBeNull();
    expect(getTile(grid, { x: 0, y: 3 })).toBeNull();
    expect(getTile(grid, { x: 2, y: 2 })).toEqual({ kind: "floor" });
  });

  it("drops out-of-bounds writes with a warning", () => {
    const grid = createGrid(3, 3);
    const warnings: GridWarning[] = [];
    const written = setTile(grid, { x: 5, y: 1 }, { kind: "wall" }, (warning) => {
      warnings.push(warning);
    });
    expect(written).toBe(false);
    expect(warnings).toEqual([
      {
        code: "tile_out_of_bounds",
        message: "Ignored wall write outside 3x3 grid at (5, 1).",
        position: { x: 5, y: 1 },
      },
    ]);
    expect(grid.tiles.every((tile) => tile.kind === "floor")).toBe(true);
  });

  it("writes in-bounds tiles row-major", () => {
    const grid = createGrid(3, 2);
    expect(setTile(grid, { x: 1, y: 1 }, { kind: "exit" })).toBe(true);
    expect(grid.tiles[4]).toEqual({ kind: "exit" });
  });

  it("treats walls and closed doors as impassable", () => {
    const { grid } = parseAsciiGrid(["#+/~^E"]);
    expect(isWalkable(grid, { x: 0, y: 0 })).toBe(false);
    expect(isWalkable(grid, { x: 1, y: 0 })).toBe(false);
    expect(isWalkable(grid, { x: 2, y: 0 })).toBe(true);
    expect(isWalkable(grid, { x: 3, y: 0 })).toBe(true);
    expect(isWalkable(grid, { x: 4, y: 0 })).toBe(true);
    expect(isWalkable(grid, { x: 5, y: 0 })).toBe(true);
    expect(isWalkable(grid, { x: 6, y: 0 })).toBe(false);
  });

  it("lists in-bounds neighbors in up, down, left, right order", () => {
    const grid = createGrid(3, 3);
    expect(neighbors4(grid, { x: 1, y: 1 })).toEqual([
      { x: 1, y: 0 },
      { x: 1, y: 2 },
      { x: 0, y: 1 },
      { x: 2, y: 1 },
    ]);
    expect(neighbors4(grid, { x: 0, y: 0 })).toEqual([
      { x: 0, y: 1 },
      { x: 1, y: 0 },
    ]);
  });

  it("copies tiles when cloning", () => {
    const grid = createGrid(2, 2);
    const copy = cloneGrid(grid);
    setTile(copy, { x: 0, y: 0 }, { kind: "wall" });
    expect(getTile(grid, { x: 0, y: 0 })).toEqual({ kind: "floor" });
  });

  it("lists matching positions row by row", () => {
    const { grid } = parseAsciiGrid(["k..", ".#k"]);
    expect(listPositions(grid, (tile) => tile.kind === "pickup")).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 1 },
    ]);
  });
});

describe("line of sight", () => {
  const { grid } = parseAsciiGrid([
    ".....",
    "..#..",
    ".+./.",
  ]);

  it("sees along a clear row or column", () => {
    expect(hasLineOfSight(grid, { x: 0, y: 0 }, { x: 4, y: 0 })).toBe(true);
    expect(hasLineOfSight(grid, { x: 0, y: 2 }, { x: 0, y: 0 })).toBe(true);
  });

  it("sees its own cell and adjacent cells", () => {
    expect(hasLineOfSight(grid, { x: 1, y: 1 }, { x: 1, y: 1 })).toBe(true);
    expect(hasLineOfSight(grid, { x: 1, y: 1 }, { x: 2, y: 1 })).toBe(true);
  });

  it("is blocked by walls and closed doors between the endpoints", () => {
    expect(hasLineOfSight(grid, { x: 0, y: 1 }, { x: 4, y: 1 })).toBe(false);
    expect(hasLineOfSight(grid, { x: 0, y: 2 }, { x: 2, y: 2 })).toBe(false);
  });

  it("passes through open doors", () => {
    expect(hasLineOfSight(grid, { x: 2, y: 2 }, { x: 4, y: 2 })).toBe(true);
  });

  it("never sees diagonally", () => {
    expect(hasLineOfSight(grid, { x: 0, y: 0 }, { x: 1, y: 1 })).toBe(false);
    expect(hasLineOfSight(grid, { x: 0, y: 0 }, { x: 4, y: 2 })).toBe(false);
  });
});
