import { z } from "zod";

export const MIN_GRID_SIZE = 5;
export const MAX_GRID_SIZE = 128;

/** Per-floor generation parameters, as handed in by the difficulty collaborator. */
export const FloorParamsSchema = z
  .object({
    width: z.number().int().min(MIN_GRID_SIZE).max(MAX_GRID_SIZE),
    height: z.number().int().min(MIN_GRID_SIZE).max(MAX_GRID_SIZE),
    wallDensity: z.number().min(0).max(1),
    guardCount: z.number().int().nonnegative(),
    doorCount: z.number().int().nonnegative().default(0),
    /** Keys placed when doors exist or `placeKeys` is set. At least one whenever doors exist. */
    keyCount: z.number().int().nonnegative().default(1),
    placeKeys: z.boolean().default(false),
    hazardCount: z.number().int().nonnegative().default(0),
    slowTerrainCount: z.number().int().nonnegative().default(0),
    slowTerrainCost: z.number().int().min(2).default(2),
    guardMinDistance: z.number().int().nonnegative().default(4),
    guardSpacing: z.number().int().nonnegative().default(2),
    keyMinDistance: z.number().int().nonnegative().default(3),
    maxAttempts: z.number().int().positive().default(200),
  })
  .strict();

export type FloorParams = z.infer<typeof FloorParamsSchema>;
export type FloorParamsInput = z.input<typeof FloorParamsSchema>;

export type FloorPreset = "sparse" | "standard" | "fortress";

export const FLOOR_PRESETS: Record<FloorPreset, FloorParamsInput> = {
  sparse: { width: 16, height: 10, wallDensity: 0.1, guardCount: 1 },
  standard: {
    width: 24,
    height: 14,
    wallDensity: 0.18,
    guardCount: 2,
    doorCount: 2,
    hazardCount: 1,
    slowTerrainCount: 3,
  },
  fortress: {
    width: 32,
    height: 18,
    wallDensity: 0.24,
    guardCount: 4,
    doorCount: 4,
    keyCount: 2,
    hazardCount: 2,
    slowTerrainCount: 6,
    slowTerrainCost: 3,
  },
};

export const isFloorPreset = (value: string): value is FloorPreset => value in FLOOR_PRESETS;
