import { z } from "zod";
import type { Position } from "../../contract/types.js";
import { getTile, inBounds, isTileWalkable, listPositions, samePosition } from "./grid.js";
import { isReachable, reachableSet } from "./pathfinding.js";
import { GenerationResultSchema, formatZodIssue, type GenerationResult } from "./types.js";
import {
  FloorValidationCodes,
  isIndexIn,
  wallsAndDoors,
  wallsOnly,
  type ValidationError,
  type ValidationResult,
} from "./validation.js";

type FloorInput = GenerationResult | z.input<typeof GenerationResultSchema>;

const formatSchemaIssue = (issue: z.ZodIssue): ValidationError => ({
  code: FloorValidationCodes.SchemaInvalid,
  message: formatZodIssue(issue),
  path: issue.path.length > 0 ? issue.path.join(".") : undefined,
});

const formatPos = (pos: Position): string => `(${pos.x}, ${pos.y})`;

function collectPlacementErrors(floor: GenerationResult): ValidationError[] {
  const errors: ValidationError[] = [];
  const grid = floor.grid;

  const named: [string, Position][] = [
    ["start", floor.start],
    ["objectivePosition", floor.objectivePosition],
    ["exitPosition", floor.exitPosition],
    ...floor.guardSpawns.map((pos, i): [string, Position] => [`guardSpawns.${i}`, pos]),
    ...floor.keySpawns.map((pos, i): [string, Position] => [`keySpawns.${i}`, pos]),
    ...floor.doorPositions.map((pos, i): [string, Position] => [`doorPositions.${i}`, pos]),
  ];
  for (const [path, pos] of named) {
    if (!inBounds(grid, pos)) {
      errors.push({
        code: FloorValidationCodes.PlacementOutOfBounds,
        message: `${path} ${formatPos(pos)} is outside the grid.`,
        path,
      });
    }
  }
  if (errors.length > 0) {
    return errors;
  }

  const landmarks: [string, Position][] = [
    ["start", floor.start],
    ["objectivePosition", floor.objectivePosition],
    ["exitPosition", floor.exitPosition],
  ];
  for (let i = 0; i < landmarks.length; i++) {
    for (let j = i + 1; j < landmarks.length; j++) {
      if (samePosition(landmarks[i][1], landmarks[j][1])) {
        errors.push({
          code: FloorValidationCodes.PlacementOverlap,
          message: `${landmarks[i][0]} and ${landmarks[j][0]} share ${formatPos(landmarks[i][1])}.`,
          path: landmarks[j][0],
        });
      }
    }
  }

  const expectTile = (path: string, pos: Position, matches: boolean, expected: string): void => {
    if (!matches) {
      errors.push({
        code: FloorValidationCodes.PlacementTileMismatch,
        message: `${path} ${formatPos(pos)} must be ${expected}, found ${getTile(grid, pos)?.kind ?? "nothing"}.`,
        path,
      });
    }
  };

  const startTile = getTile(grid, floor.start);
  expectTile("start", floor.start, startTile !== null && isTileWalkable(startTile), "walkable");

  const objectiveTile = getTile(grid, floor.objectivePosition);
  expectTile(
    "objectivePosition",
    floor.objectivePosition,
    objectiveTile?.kind === "pickup" && objectiveTile.item === "objective",
    "the objective pickup",
  );
  expectTile(
    "exitPosition",
    floor.exitPosition,
    getTile(grid, floor.exitPosition)?.kind === "exit",
    "an exit",
  );
  floor.keySpawns.forEach((pos, i) => {
    const tile = getTile(grid, pos);
    expectTile(
      `keySpawns.${i}`,
      pos,
      tile?.kind === "pickup" && tile.item === "keycard",
      "a keycard pickup",
    );
  });
  floor.doorPositions.forEach((pos, i) => {
    expectTile(`doorPositions.${i}`, pos, getTile(grid, pos)?.kind === "door", "a door");
  });
  floor.guardSpawns.forEach((pos, i) => {
    const tile = getTile(grid, pos);
    expectTile(`guardSpawns.${i}`, pos, tile !== null && isTileWalkable(tile), "walkable");
    if (samePosition(pos, floor.start)) {
      errors.push({
        code: FloorValidationCodes.GuardTooClose,
        message: `guardSpawns.${i} spawns on the player start.`,
        path: `guardSpawns.${i}`,
      });
    }
  });

  return errors;
}

/**
 * Checks a generated floor for solvability:
 * - start reaches the objective and the objective reaches the exit (walls block);
 * - when any door exists, at least one keycard exists and one is reachable from
 *   start without crossing a door.
 */
export const validateFloor = (input: FloorInput): ValidationResult => {
  const parsed = GenerationResultSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map(formatSchemaIssue) };
  }
  const floor = parsed.data;
  const grid = floor.grid;

  const errors = collectPlacementErrors(floor);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const passable = wallsOnly(grid);
  if (!isReachable(grid, passable, floor.start, floor.objectivePosition)) {
    errors.push({
      code: FloorValidationCodes.PathNoStartToObjective,
      message: "Objective is not reachable from start.",
      path: "objectivePosition",
    });
  }
  if (!isReachable(grid, passable, floor.objectivePosition, floor.exitPosition)) {
    errors.push({
      code: FloorValidationCodes.PathNoObjectiveToExit,
      message: "Exit is not reachable from the objective.",
      path: "exitPosition",
    });
  }

  const doors = listPositions(grid, (tile) => tile.kind === "door");
  if (doors.length > 0) {
    const keys = listPositions(
      grid,
      (tile) => tile.kind === "pickup" && tile.item === "keycard",
    );
    if (keys.length === 0) {
      errors.push({
        code: FloorValidationCodes.DoorsWithoutKey,
        message: `Floor has ${doors.length} door(s) but no keycard.`,
        path: "keySpawns",
        details: { doorCount: doors.length },
      });
    } else {
      const reachable = reachableSet(grid, wallsAndDoors(grid), floor.start);
      if (!keys.some((key) => isIndexIn(grid, reachable, key))) {
        errors.push({
          code: FloorValidationCodes.SoftlockDetected,
          message: "Every keycard sits behind a door.",
          path: "keySpawns",
          details: { keyCount: keys.length, doorCount: doors.length },
        });
      }
    }
  }

  if (errors.length === 0) {
    return { ok: true, errors: [] };
  }
  return { ok: false, errors };
};
