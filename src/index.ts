// Contract types
export type {
  Seed,
  RunSeed,
  GuardId,
  JsonValue,
  Position,
  Direction,
  GuardMode,
  PickupKind,
  FloorStatus,
  SimEvent,
  SimEventType,
  PickupCollectedEvent,
  DoorOpenedEvent,
  HazardTriggeredEvent,
  GuardStateChangedEvent,
  ExitLockedEvent,
  TurnCompletedEvent,
  FloorWonEvent,
  FloorLostEvent,
} from "./contract/types.js";

// Contract interfaces
export type { InputAgent } from "./contract/interfaces.js";

// Core
export {
  createRng,
  randomInt,
  deriveSeed,
  hashSeedString,
  normalizeRunSeed,
  combineSeed,
  createSeededStream,
  createFloorStream,
  createCosmeticSeed,
} from "./core/rng.js";
export type { SeededStream, WeightedEntry } from "./core/rng.js";
export { stableStringify, toStableJsonl } from "./core/json.js";
export { hashStable, sha256Hex } from "./core/hash.js";

// Grid world
export {
  createGrid,
  cloneGrid,
  getTile,
  setTile,
  inBounds,
  isWalkable,
  isTileWalkable,
  blocksSight,
  hasLineOfSight,
  neighbors4,
  manhattan,
  listPositions,
} from "./games/stealth/grid.js";
export type { GridWarning, WarningSink } from "./games/stealth/grid.js";
export {
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  GuardTuningSchema,
  ScoringSchema,
  PlayerActionSchema,
  GenerationResultSchema,
  RunSeedSchema,
  FloorOriginSchema,
} from "./games/stealth/types.js";
export type {
  Tile,
  TileKind,
  GridData,
  ReadonlyGrid,
  GenerationResult,
  GuardTuning,
  Scoring,
  PlayerAction,
} from "./games/stealth/types.js";
export { renderGrid } from "./games/stealth/render.js";

// Pathfinding
export { shortestPath, cheapestPath, isReachable, reachableSet } from "./games/stealth/pathfinding.js";
export type { CostedPath, PassablePredicate, StepCost } from "./games/stealth/pathfinding.js";

// Guards
export { createGuard, stepGuard, alertGuard, canSeePlayer } from "./games/stealth/guard.js";
export type { GuardAgent, GuardContext, GuardStepOutcome } from "./games/stealth/guard.js";

// Generation
export {
  generateFloor,
  generateFloorFromStream,
  hashLayout,
  GENERATION_ERROR_CODES,
} from "./games/stealth/generator.js";
export type { GenerationOutcome, GenerationFailure } from "./games/stealth/generator.js";
export { FloorParamsSchema, FLOOR_PRESETS } from "./games/stealth/generatorTypes.js";
export type { FloorParams, FloorParamsInput } from "./games/stealth/generatorTypes.js";
export { validateFloor } from "./games/stealth/validator.js";
export { FloorValidationCodes } from "./games/stealth/validation.js";
export type { ValidationError, ValidationResult } from "./games/stealth/validation.js";

// Turn scheduler
export { createTurnScheduler, initializeFloor } from "./scenarios/stealth/index.js";
export type {
  TurnScheduler,
  FloorSetup,
  FloorView,
  StepResult,
  Inventory,
} from "./scenarios/stealth/index.js";
export { STEALTH_ERROR_CODES, STEALTH_RESULT_CODES } from "./scenarios/stealth/feedbackCodes.js";

// Run
export { RunConfigSchema, loadRunConfig, parseRunConfig, resolveFloorParams } from "./engine/runConfig.js";
export type { RunConfig, RunConfigInput } from "./engine/runConfig.js";
export { createRunController, parseRunSnapshot, RunSnapshotSchema } from "./engine/runController.js";
export type { RunController, RunSnapshot } from "./engine/runController.js";
export { runFloor } from "./engine/runFloor.js";
export type { RunFloorResult } from "./engine/runFloor.js";

// Agents
export { createScriptedAgent } from "./agents/scriptedAgent.js";
export { createRandomAgent } from "./agents/randomAgent.js";
export { createSeekerAgent } from "./agents/seekerAgent.js";
