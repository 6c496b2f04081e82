import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  MAX_GRID_SIZE,
  MIN_GRID_SIZE,
  type FloorParamsInput,
} from "../games/stealth/generatorTypes.js";
import { GuardTuningSchema, ScoringSchema, formatZodIssue } from "../games/stealth/types.js";

/** Whole-run tunables. `{}` parses to a playable three-floor run. */
export const RunConfigSchema = z
  .object({
    width: z.number().int().min(MIN_GRID_SIZE).max(MAX_GRID_SIZE).default(24),
    height: z.number().int().min(MIN_GRID_SIZE).max(MAX_GRID_SIZE).default(14),
    wallDensity: z.number().min(0).max(1).default(0.18),
    guardCount: z.number().int().nonnegative().default(1),
    /** Guards added per floor beyond the first. */
    guardRamp: z.number().int().nonnegative().default(1),
    doorCount: z.number().int().nonnegative().default(0),
    doorRamp: z.number().int().nonnegative().default(1),
    keyCount: z.number().int().nonnegative().default(1),
    hazardCount: z.number().int().nonnegative().default(1),
    slowTerrainCount: z.number().int().nonnegative().default(2),
    slowTerrainCost: z.number().int().min(2).default(2),
    guardMinDistance: z.number().int().nonnegative().default(4),
    guardSpacing: z.number().int().nonnegative().default(2),
    keyMinDistance: z.number().int().nonnegative().default(3),
    maxAttempts: z.number().int().positive().default(200),
    floorCount: z.number().int().positive().default(3),
    guards: GuardTuningSchema.default({}),
    scoring: ScoringSchema.default({}),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export type ConfigResult =
  | { ok: true; value: RunConfig }
  | { ok: false; errors: string[] };

export function parseRunConfig(input: unknown): ConfigResult {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map(formatZodIssue) };
  }
  return { ok: true, value: parsed.data };
}

/** Reads and validates a JSON run config. Read and parse failures come back as errors. */
export function loadRunConfig(path: string): ConfigResult {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`[config] cannot read ${path}: ${reason}`] };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`[config] ${path} is not valid JSON: ${reason}`] };
  }
  const result = parseRunConfig(json);
  if (!result.ok) {
    return { ok: false, errors: result.errors.map((message) => `[config] ${message}`) };
  }
  return result;
}

/** Generation parameters for one floor. Guard and door counts grow with the floor index. */
export function resolveFloorParams(config: RunConfig, floorIndex: number): FloorParamsInput {
  const depth = Math.max(0, Math.floor(floorIndex));
  return {
    width: config.width,
    height: config.height,
    wallDensity: config.wallDensity,
    guardCount: config.guardCount + config.guardRamp * depth,
    doorCount: config.doorCount + config.doorRamp * depth,
    keyCount: config.keyCount,
    hazardCount: config.hazardCount,
    slowTerrainCount: config.slowTerrainCount,
    slowTerrainCost: config.slowTerrainCost,
    guardMinDistance: config.guardMinDistance,
    guardSpacing: config.guardSpacing,
    keyMinDistance: config.keyMinDistance,
    maxAttempts: config.maxAttempts,
  };
}
