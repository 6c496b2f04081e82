import type { Position, RunSeed } from "../../contract/types.js";
import { hashStable } from "../../core/hash.js";
import { createFloorStream, type SeededStream } from "../../core/rng.js";
import { createGrid, getTile, listPositions, manhattan, offset, setTile } from "./grid.js";
import { isReachable, reachableSet } from "./pathfinding.js";
import { FloorParamsSchema, type FloorParams, type FloorParamsInput } from "./generatorTypes.js";
import {
  DIRECTION_VECTORS,
  FloorOriginSchema,
  formatZodIssue,
  type GenerationResult,
  type GridData,
  type Tile,
} from "./types.js";
import {
  FloorValidationCodes,
  isIndexIn,
  positionKey,
  wallsAndDoors,
  wallsOnly,
} from "./validation.js";
import { validateFloor } from "./validator.js";

export const GENERATION_ERROR_CODES = {
  config_invalid: "config_invalid",
  generation_exhausted: "generation_exhausted",
} as const;

/** Why a single attempt was thrown away. */
export const ATTEMPT_REJECTION_CODES = {
  too_few_floor_cells: "too_few_floor_cells",
  guard_placement_failed: "guard_placement_failed",
  key_placement_failed: "key_placement_failed",
  ...FloorValidationCodes,
} as const;

export type AttemptRejectionCode =
  (typeof ATTEMPT_REJECTION_CODES)[keyof typeof ATTEMPT_REJECTION_CODES];

export type GenerationFailure =
  | {
      ok: false;
      code: typeof GENERATION_ERROR_CODES.config_invalid;
      reason: string;
      errors: string[];
    }
  | {
      ok: false;
      code: typeof GENERATION_ERROR_CODES.generation_exhausted;
      reason: string;
      attemptCount: number;
      lastRejection: AttemptRejectionCode[];
    };

export type GenerationOutcome = { ok: true; value: GenerationResult } | GenerationFailure;

export interface FloorOrigin {
  runSeed: RunSeed;
  floorIndex: number;
}

type Draft = Omit<GenerationResult, "attemptCount" | "runSeed" | "floorIndex" | "combinedSeed">;

type AttemptResult = { ok: true; draft: Draft } | { ok: false; rejection: AttemptRejectionCode[] };

const reject = (...rejection: AttemptRejectionCode[]): AttemptResult => ({ ok: false, rejection });

function carve(params: FloorParams, stream: SeededStream): GridData {
  const grid = createGrid(params.width, params.height);
  for (let y = 0; y < params.height; y++) {
    for (let x = 0; x < params.width; x++) {
      const border = x === 0 || y === 0 || x === params.width - 1 || y === params.height - 1;
      if (border || stream.float() < params.wallDensity) {
        setTile(grid, { x, y }, { kind: "wall" });
      }
    }
  }
  return grid;
}

const isWallAt = (grid: GridData, pos: Position): boolean => getTile(grid, pos)?.kind === "wall";

/** A corridor cell walled on two opposite sides and open on the other two. */
function isChokepoint(grid: GridData, pos: Position): boolean {
  const wall = (direction: keyof typeof DIRECTION_VECTORS): boolean =>
    isWallAt(grid, offset(pos, DIRECTION_VECTORS[direction]));
  const horizontal = wall("left") && wall("right") && !wall("up") && !wall("down");
  const vertical = wall("up") && wall("down") && !wall("left") && !wall("right");
  return horizontal || vertical;
}

function attempt(params: FloorParams, stream: SeededStream): AttemptResult {
  const grid = carve(params, stream);
  const floorCells = listPositions(grid, (tile) => tile.kind === "floor");
  if (floorCells.length < 3) {
    return reject(ATTEMPT_REJECTION_CODES.too_few_floor_cells);
  }

  const order = stream.shuffle(floorCells);
  const [start, objectivePosition, exitPosition] = order;
  const passable = wallsOnly(grid);
  if (!isReachable(grid, passable, start, objectivePosition)) {
    return reject(ATTEMPT_REJECTION_CODES.PathNoStartToObjective);
  }
  if (!isReachable(grid, passable, objectivePosition, exitPosition)) {
    return reject(ATTEMPT_REJECTION_CODES.PathNoObjectiveToExit);
  }
  setTile(grid, objectivePosition, { kind: "pickup", item: "objective" });
  setTile(grid, exitPosition, { kind: "exit" });

  const landmarks = [start, objectivePosition, exitPosition];
  const used = new Set(landmarks.map(positionKey));
  const pool = order.slice(3);

  const take = (count: number, accept: (pos: Position) => boolean): Position[] => {
    const taken: Position[] = [];
    for (const pos of pool) {
      if (taken.length >= count) {
        break;
      }
      if (used.has(positionKey(pos)) || !accept(pos)) {
        continue;
      }
      used.add(positionKey(pos));
      taken.push(pos);
    }
    return taken;
  };
  const place = (positions: Position[], tile: () => Tile): void => {
    for (const pos of positions) {
      setTile(grid, pos, tile());
    }
  };

  const doorPositions = take(params.doorCount, (pos) => isChokepoint(grid, pos));
  place(doorPositions, () => ({ kind: "door", open: false }));
  place(take(params.slowTerrainCount, () => true), () => ({
    kind: "slow",
    cost: params.slowTerrainCost,
  }));
  place(take(params.hazardCount, () => true), () => ({ kind: "hazard", armed: true }));

  const guardSpawns: Position[] = [];
  for (let i = 0; i < params.guardCount; i++) {
    const [spawn] = take(
      1,
      (pos) =>
        landmarks.every((landmark) => manhattan(landmark, pos) >= params.guardMinDistance) &&
        guardSpawns.every((other) => manhattan(other, pos) >= params.guardSpacing),
    );
    if (!spawn) {
      return reject(ATTEMPT_REJECTION_CODES.guard_placement_failed);
    }
    guardSpawns.push(spawn);
  }

  const wantsKeys = doorPositions.length > 0 || params.placeKeys;
  const keyCount = wantsKeys ? Math.max(params.keyCount, doorPositions.length > 0 ? 1 : 0) : 0;
  const reachableWithoutDoors = reachableSet(grid, wallsAndDoors(grid), start);
  const keySpawns: Position[] = [];
  for (let i = 0; i < keyCount; i++) {
    // The first key must be collectable before any door opens.
    const mustBeReachable = i === 0 && doorPositions.length > 0;
    const [spawn] = take(
      1,
      (pos) =>
        landmarks.every((landmark) => manhattan(landmark, pos) >= params.keyMinDistance) &&
        (!mustBeReachable || isIndexIn(grid, reachableWithoutDoors, pos)),
    );
    if (!spawn) {
      return reject(ATTEMPT_REJECTION_CODES.key_placement_failed);
    }
    keySpawns.push(spawn);
  }
  place(keySpawns, () => ({ kind: "pickup", item: "keycard" }));

  return {
    ok: true,
    draft: { grid, start, objectivePosition, exitPosition, guardSpawns, keySpawns, doorPositions },
  };
}

function freezeResult(result: GenerationResult): GenerationResult {
  for (const tile of result.grid.tiles) {
    Object.freeze(tile);
  }
  Object.freeze(result.grid.tiles);
  Object.freeze(result.grid);
  for (const list of [result.guardSpawns, result.keySpawns, result.doorPositions]) {
    list.forEach((pos) => Object.freeze(pos));
    Object.freeze(list);
  }
  Object.freeze(result.start);
  Object.freeze(result.objectivePosition);
  Object.freeze(result.exitPosition);
  return Object.freeze(result);
}

/**
 * Generates a floor from an already-created stream. The caller keeps the
 * stream and may continue drawing from it (guard initialization does).
 */
export function generateFloorFromStream(
  input: FloorParamsInput,
  stream: SeededStream,
  origin: FloorOrigin,
): GenerationOutcome {
  const parsed = FloorParamsSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(formatZodIssue);
    return {
      ok: false,
      code: GENERATION_ERROR_CODES.config_invalid,
      reason: `Invalid floor parameters: ${errors.join("; ")}`,
      errors,
    };
  }
  const params = parsed.data;

  const parsedOrigin = FloorOriginSchema.safeParse(origin);
  if (!parsedOrigin.success) {
    const errors = parsedOrigin.error.issues.map(formatZodIssue);
    return {
      ok: false,
      code: GENERATION_ERROR_CODES.config_invalid,
      reason: `Invalid floor origin: ${errors.join("; ")}`,
      errors,
    };
  }

  let lastRejection: AttemptRejectionCode[] = [];
  for (let attemptCount = 1; attemptCount <= params.maxAttempts; attemptCount++) {
    const result = attempt(params, stream);
    if (!result.ok) {
      lastRejection = result.rejection;
      continue;
    }
    const candidate: GenerationResult = {
      ...result.draft,
      attemptCount,
      runSeed: origin.runSeed,
      floorIndex: origin.floorIndex,
      combinedSeed: stream.seed,
    };
    const validation = validateFloor(candidate);
    if (!validation.ok) {
      lastRejection = validation.errors.map((error) => error.code);
      continue;
    }
    return { ok: true, value: freezeResult(candidate) };
  }

  return {
    ok: false,
    code: GENERATION_ERROR_CODES.generation_exhausted,
    reason: `No valid floor after ${params.maxAttempts} attempts (last rejection: ${lastRejection.join(", ") || "none"}).`,
    attemptCount: params.maxAttempts,
    lastRejection,
  };
}

/**
 * Generates the floor for `(runSeed, floorIndex)` on a fresh floor stream and
 * drops the stream. Guards for a playable floor come from `initializeFloor` on
 * the stream generation used, so callers that play the floor go through
 * `createFloorStream` and `generateFloorFromStream` instead.
 */
export function generateFloor(
  params: FloorParamsInput,
  runSeed: RunSeed,
  floorIndex = 0,
): GenerationOutcome {
  return generateFloorFromStream(params, createFloorStream(runSeed, floorIndex), {
    runSeed,
    floorIndex,
  });
}

/** Stable content hash of a generated floor. Equal hashes mean equal layouts. */
export function hashLayout(result: GenerationResult): string {
  return hashStable(result);
}
