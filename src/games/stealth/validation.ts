import type { Position } from "../../contract/types.js";
import { getTile, inBounds, indexOf, isTileWalkable } from "./grid.js";
import type { PassablePredicate } from "./pathfinding.js";
import type { ReadonlyGrid } from "./types.js";

export type ValidationError = {
  code: FloorValidationCode;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidationResult = {
  ok: boolean;
  errors: ValidationError[];
};

export const FloorValidationCodes = {
  SchemaInvalid: "FLOOR_SCHEMA_INVALID",
  PlacementOutOfBounds: "FLOOR_PLACEMENT_OUT_OF_BOUNDS",
  PlacementOverlap: "FLOOR_PLACEMENT_OVERLAP",
  PlacementTileMismatch: "FLOOR_PLACEMENT_TILE_MISMATCH",
  PathNoStartToObjective: "FLOOR_PATH_NO_START_TO_OBJECTIVE",
  PathNoObjectiveToExit: "FLOOR_PATH_NO_OBJECTIVE_TO_EXIT",
  DoorsWithoutKey: "FLOOR_DOORS_WITHOUT_KEY",
  SoftlockDetected: "FLOOR_SOFTLOCK_DETECTED",
  GuardTooClose: "FLOOR_GUARD_TOO_CLOSE",
} as const;

export type FloorValidationCode = (typeof FloorValidationCodes)[keyof typeof FloorValidationCodes];

/** Reachability used for start/objective/exit: only walls stop the walk. */
export const wallsOnly =
  (grid: ReadonlyGrid): PassablePredicate =>
  (pos) => {
    const tile = getTile(grid, pos);
    return tile !== null && tile.kind !== "wall";
  };

/** Reachability used for keys: doors count as impassable whatever their state. */
export const wallsAndDoors =
  (grid: ReadonlyGrid): PassablePredicate =>
  (pos) => {
    const tile = getTile(grid, pos);
    return tile !== null && tile.kind !== "door" && isTileWalkable(tile);
  };

export const positionKey = (pos: Position): string => `${pos.x},${pos.y}`;

export const isIndexIn = (grid: ReadonlyGrid, set: Set<number>, pos: Position): boolean =>
  inBounds(grid, pos) && set.has(indexOf(grid, pos));
