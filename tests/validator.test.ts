import { describe, expect, it } from "vitest";
import { validateFloor } from "../src/games/stealth/validator.js";
import { floorFromRows } from "./helpers/floorFixture.js";

const codes = (result: ReturnType<typeof validateFloor>): string[] =>
  result.errors.map((error) => error.code);

const solvable = [
  "#######",
  "#Sk.O.#",
  "###+###",
  "#...E.#",
  "#######",
];

describe("floor validator", () => {
  it("accepts a solvable floor", () => {
    expect(validateFloor(floorFromRows(solvable))).toEqual({ ok: true, errors: [] });
  });

  it("flags every keycard sitting behind a door", () => {
    const result = validateFloor(
      floorFromRows(["#######", "#S..O.#", "###+###", "#k..E.#", "#######"]),
    );
    expect(result.ok).toBe(false);
    expect(codes(result)).toEqual(["FLOOR_SOFTLOCK_DETECTED"]);
  });

  it("flags doors with no keycard at all", () => {
    const result = validateFloor(
      floorFromRows(["#######", "#S..O.#", "###+###", "#...E.#", "#######"]),
    );
    expect(result.errors).toEqual([
      {
        code: "FLOOR_DOORS_WITHOUT_KEY",
        message: "Floor has 1 door(s) but no keycard.",
        path: "keySpawns",
        details: { doorCount: 1 },
      },
    ]);
  });

  it("flags an objective walled off from the start", () => {
    const result = validateFloor(floorFromRows(["#######", "#S.#OE#", "#######"]));
    expect(codes(result)).toEqual(["FLOOR_PATH_NO_START_TO_OBJECTIVE"]);
  });

  it("flags an exit walled off from the objective", () => {
    const result = validateFloor(floorFromRows(["#######", "#S.O#E#", "#######"]));
    expect(codes(result)).toEqual(["FLOOR_PATH_NO_OBJECTIVE_TO_EXIT"]);
  });

  it("reports placements outside the grid", () => {
    const floor = { ...floorFromRows(solvable), guardSpawns: [{ x: 9, y: 9 }] };
    expect(validateFloor(floor).errors).toEqual([
      {
        code: "FLOOR_PLACEMENT_OUT_OF_BOUNDS",
        message: "guardSpawns.0 (9, 9) is outside the grid.",
        path: "guardSpawns.0",
      },
    ]);
  });

  it("reports landmarks that do not match their tiles", () => {
    const floor = { ...floorFromRows(solvable), objectivePosition: { x: 5, y: 1 } };
    expect(validateFloor(floor).errors).toEqual([
      {
        code: "FLOOR_PLACEMENT_TILE_MISMATCH",
        message: "objectivePosition (5, 1) must be the objective pickup, found floor.",
        path: "objectivePosition",
      },
    ]);
  });

  it("rejects a guard spawning on the player", () => {
    const floor = { ...floorFromRows(solvable), guardSpawns: [{ x: 1, y: 1 }] };
    expect(codes(validateFloor(floor))).toEqual(["FLOOR_GUARD_TOO_CLOSE"]);
  });

  it("rejects malformed input through the schema", () => {
    const floor = floorFromRows(solvable);
    const broken = { ...floor, grid: { ...floor.grid, tiles: floor.grid.tiles.slice(0, 3) } };
    expect(validateFloor(broken)).toEqual({
      ok: false,
      errors: [
        {
          code: "FLOOR_SCHEMA_INVALID",
          message: "grid.tiles: Grid has 3 tiles, expected 35",
          path: "grid.tiles",
        },
      ],
    });
  });
});
