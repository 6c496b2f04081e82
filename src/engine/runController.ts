import { z } from "zod";
import type { FloorStatus, RunSeed, SimEvent } from "../contract/types.js";
import { createCosmeticSeed, createFloorStream } from "../core/rng.js";
import {
  GENERATION_ERROR_CODES,
  generateFloorFromStream,
  type AttemptRejectionCode,
} from "../games/stealth/generator.js";
import type { WarningSink } from "../games/stealth/grid.js";
import {
  RunSeedSchema,
  formatZodIssue,
  type GenerationResult,
  type PlayerAction,
} from "../games/stealth/types.js";
import {
  createTurnScheduler,
  initializeFloor,
  type EventListener,
  type FloorSetup,
  type FloorView,
  type Inventory,
  type StepResult,
  type TurnScheduler,
} from "../scenarios/stealth/index.js";
import { parseRunConfig, resolveFloorParams, type RunConfig } from "./runConfig.js";

export type RunStatus = FloorStatus;

/** Plain data handed to a save collaborator after any step. */
export interface RunSnapshot {
  runSeed: RunSeed;
  floorIndex: number;
  turnCount: number;
  inventory: Inventory;
  score: number;
  status: RunStatus;
}

export const RunSnapshotSchema = z
  .object({
    runSeed: RunSeedSchema,
    floorIndex: z.number().int().nonnegative(),
    turnCount: z.number().int().nonnegative(),
    inventory: z
      .object({
        keycard: z.number().int().nonnegative(),
        objective: z.number().int().nonnegative(),
      })
      .strict(),
    score: z.number().int().nonnegative(),
    status: z.enum(["playing", "won", "lost"]),
  })
  .strict();

export function parseRunSnapshot(
  input: unknown,
): { ok: true; value: RunSnapshot } | { ok: false; errors: string[] } {
  const parsed = RunSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map(formatZodIssue) };
  }
  return { ok: true, value: parsed.data };
}

export type RunStartFailure =
  | { ok: false; code: typeof GENERATION_ERROR_CODES.config_invalid; reason: string; errors: string[] }
  | {
      ok: false;
      code: typeof GENERATION_ERROR_CODES.generation_exhausted;
      reason: string;
      floorIndex: number;
      attemptCount: number;
      lastRejection: AttemptRejectionCode[];
    };

export interface RunController {
  readonly runSeed: RunSeed;
  readonly config: RunConfig;
  readonly floors: readonly GenerationResult[];
  floorIndex(): number;
  /** Scheduler of the floor being played. */
  current(): TurnScheduler;
  submit(action: PlayerAction): StepResult;
  view(): FloorView;
  status(): RunStatus;
  snapshot(): RunSnapshot;
  subscribe(listener: EventListener): () => void;
}

export interface RunControllerOptions {
  warn?: WarningSink;
}

const isBlankSeed = (seed: RunSeed): boolean => typeof seed === "string" && seed.trim() === "";

/**
 * Generates every floor of a run up front, each on its own floor stream, and
 * initializes its guards from that same stream. Floors advance on a win; a
 * capture ends the run.
 */
export function createRunController(
  configInput: unknown,
  runSeed?: RunSeed,
  options: RunControllerOptions = {},
): { ok: true; value: RunController } | RunStartFailure {
  const parsedConfig = parseRunConfig(configInput);
  if (!parsedConfig.ok) {
    return {
      ok: false,
      code: GENERATION_ERROR_CODES.config_invalid,
      reason: `Invalid run config: ${parsedConfig.errors.join("; ")}`,
      errors: parsedConfig.errors,
    };
  }
  const config = parsedConfig.value;
  const seed: RunSeed = runSeed === undefined || isBlankSeed(runSeed) ? createCosmeticSeed() : runSeed;

  const floors: GenerationResult[] = [];
  const setups: FloorSetup[] = [];
  for (let index = 0; index < config.floorCount; index++) {
    const stream = createFloorStream(seed, index);
    const outcome = generateFloorFromStream(resolveFloorParams(config, index), stream, {
      runSeed: seed,
      floorIndex: index,
    });
    if (!outcome.ok) {
      if (outcome.code === GENERATION_ERROR_CODES.config_invalid) {
        return outcome;
      }
      return { ...outcome, floorIndex: index };
    }
    floors.push(outcome.value);
    setups.push(initializeFloor(outcome.value, stream));
  }

  const listeners = new Set<EventListener>();
  const totals = { turns: 0, score: 0, inventory: { keycard: 0, objective: 0 } };
  let floorIndex = 0;

  const open = (index: number): TurnScheduler => {
    const scheduler = createTurnScheduler(setups[index], {
      tuning: config.guards,
      scoring: config.scoring,
      warn: options.warn,
    });
    scheduler.subscribe((event: SimEvent) => {
      for (const listener of listeners) {
        listener(event);
      }
    });
    return scheduler;
  };
  let scheduler = open(0);

  const status = (): RunStatus => {
    const floorStatus = scheduler.status();
    if (floorStatus === "won" && floorIndex < config.floorCount - 1) {
      return "playing";
    }
    return floorStatus;
  };

  const submit = (action: PlayerAction): StepResult => {
    const result = scheduler.submit(action);
    if (result.valid && scheduler.status() === "won" && floorIndex < config.floorCount - 1) {
      const view = scheduler.view();
      totals.turns += view.turn;
      totals.score += view.score;
      totals.inventory.keycard += view.player.inventory.keycard;
      totals.inventory.objective += view.player.inventory.objective;
      floorIndex += 1;
      scheduler = open(floorIndex);
    }
    return result;
  };

  const snapshot = (): RunSnapshot => {
    const view = scheduler.view();
    return {
      runSeed: seed,
      floorIndex,
      turnCount: totals.turns + view.turn,
      inventory: {
        keycard: totals.inventory.keycard + view.player.inventory.keycard,
        objective: totals.inventory.objective + view.player.inventory.objective,
      },
      score: totals.score + view.score,
      status: status(),
    };
  };

  return {
    ok: true,
    value: {
      runSeed: seed,
      config,
      floors,
      floorIndex: () => floorIndex,
      current: () => scheduler,
      submit,
      view: () => scheduler.view(),
      status,
      snapshot,
      subscribe: (listener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
    },
  };
}
