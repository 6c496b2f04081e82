import { z } from "zod";
import type { Direction, PickupKind, Position, RunSeed, Seed } from "../../contract/types.js";

// ---------------------------------------------------------------------------
// Tiles
// ---------------------------------------------------------------------------

export interface FloorTile {
  kind: "floor";
}

export interface WallTile {
  kind: "wall";
}

export interface DoorTile {
  kind: "door";
  open: boolean;
}

export interface ExitTile {
  kind: "exit";
}

export interface HazardTile {
  kind: "hazard";
  armed: boolean;
}

export interface SlowTile {
  kind: "slow";
  /** Activations needed to leave the tile after entering it. */
  cost: number;
}

export interface PickupTile {
  kind: "pickup";
  item: PickupKind;
}

export type Tile = FloorTile | WallTile | DoorTile | ExitTile | HazardTile | SlowTile | PickupTile;

export type TileKind = Tile["kind"];

export interface GridBounds {
  readonly width: number;
  readonly height: number;
}

/** Row-major tile storage: the tile at (x, y) lives at `y * width + x`. */
export interface GridData extends GridBounds {
  tiles: Tile[];
}

export interface ReadonlyGrid extends GridBounds {
  readonly tiles: readonly Readonly<Tile>[];
}

export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/** Fixed neighbor visitation order. Path tie-breaks and interact scans follow it. */
export const DIRECTION_ORDER: readonly Direction[] = ["up", "down", "left", "right"];

// ---------------------------------------------------------------------------
// Generation result
// ---------------------------------------------------------------------------

/** Immutable output of the dungeon generator. Live agents are built by the caller. */
export interface GenerationResult {
  readonly grid: ReadonlyGrid;
  readonly start: Position;
  readonly objectivePosition: Position;
  readonly exitPosition: Position;
  readonly guardSpawns: readonly Position[];
  readonly keySpawns: readonly Position[];
  readonly doorPositions: readonly Position[];
  readonly attemptCount: number;
  readonly runSeed: RunSeed;
  readonly floorIndex: number;
  readonly combinedSeed: Seed;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const PositionSchema = z.object({ x: z.number().int(), y: z.number().int() }).strict();

export const DirectionSchema = z.enum(["up", "down", "left", "right"]);

export const TileSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("floor") }).strict(),
  z.object({ kind: z.literal("wall") }).strict(),
  z.object({ kind: z.literal("door"), open: z.boolean() }).strict(),
  z.object({ kind: z.literal("exit") }).strict(),
  z.object({ kind: z.literal("hazard"), armed: z.boolean() }).strict(),
  z.object({ kind: z.literal("slow"), cost: z.number().int().min(1) }).strict(),
  z.object({ kind: z.literal("pickup"), item: z.enum(["keycard", "objective"]) }).strict(),
]);

export const GridSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    tiles: z.array(TileSchema),
  })
  .strict()
  .superRefine((grid, ctx) => {
    if (grid.tiles.length !== grid.width * grid.height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Grid has ${grid.tiles.length} tiles, expected ${grid.width * grid.height}`,
        path: ["tiles"],
      });
    }
  });

/** Any string is hashed, so the empty string is a valid run seed. */
export const RunSeedSchema = z.union([
  z.string(),
  z.number().int({ message: "Run seed must be an integer" }),
]);

export const FloorOriginSchema = z
  .object({
    runSeed: RunSeedSchema,
    floorIndex: z.number().int(),
  })
  .strict();

export const GenerationResultSchema = z
  .object({
    grid: GridSchema,
    start: PositionSchema,
    objectivePosition: PositionSchema,
    exitPosition: PositionSchema,
    guardSpawns: z.array(PositionSchema),
    keySpawns: z.array(PositionSchema),
    doorPositions: z.array(PositionSchema),
    attemptCount: z.number().int().positive(),
    runSeed: RunSeedSchema,
    floorIndex: z.number().int(),
    combinedSeed: z.number().int(),
  })
  .strict();

/** Guard tuning handed in by the difficulty collaborator. */
export const GuardTuningSchema = z
  .object({
    visionRange: z.number().int().positive().default(6),
    chaseDuration: z.number().int().positive().default(5),
    alertDuration: z.number().int().positive().default(4),
    hazardAlertRadius: z.number().int().nonnegative().default(5),
    /** Pursue along the cheapest path (slow terrain costs more) instead of the shortest. */
    terrainAwarePursuit: z.boolean().default(false),
  })
  .strict();

export type GuardTuning = z.infer<typeof GuardTuningSchema>;

export const DEFAULT_GUARD_TUNING: GuardTuning = GuardTuningSchema.parse({});

export const ScoringSchema = z
  .object({
    keycard: z.number().int().nonnegative().default(10),
    objective: z.number().int().nonnegative().default(100),
    floorCleared: z.number().int().nonnegative().default(250),
  })
  .strict();

export type Scoring = z.infer<typeof ScoringSchema>;

export const DEFAULT_SCORING: Scoring = ScoringSchema.parse({});

export function formatZodIssue(issue: z.ZodIssue): string {
  if (issue.path.length === 0) {
    return issue.message;
  }
  return `${issue.path.join(".")}: ${issue.message}`;
}

// ---------------------------------------------------------------------------
// Player input
// ---------------------------------------------------------------------------

export const PlayerActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("move"), direction: DirectionSchema }).strict(),
  z.object({ type: z.literal("wait") }).strict(),
  z.object({ type: z.literal("interact") }).strict(),
]);

export type PlayerAction = z.infer<typeof PlayerActionSchema>;
