import type {
  Direction,
  FloorStatus,
  GuardId,
  GuardMode,
  PendingEvent,
  PickupKind,
  Position,
  Seed,
  SimEvent,
} from "../../contract/types.js";
import { createSeededStream, type SeededStream } from "../../core/rng.js";
import {
  cloneGrid,
  consoleWarningSink,
  getTile,
  isWalkable,
  manhattan,
  offset,
  samePosition,
  setTile,
  type WarningSink,
} from "../../games/stealth/grid.js";
import { alertGuard, createGuard, stepGuard, type GuardAgent } from "../../games/stealth/guard.js";
import {
  DEFAULT_GUARD_TUNING,
  DEFAULT_SCORING,
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  PlayerActionSchema,
  formatZodIssue,
  type GenerationResult,
  type GridData,
  type GuardTuning,
  type PlayerAction,
  type ReadonlyGrid,
  type Scoring,
} from "../../games/stealth/types.js";
import {
  STEALTH_ERROR_CODES,
  STEALTH_RESULT_CODES,
  type StealthErrorCode,
  type StealthResultCode,
} from "./feedbackCodes.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Inventory = Record<PickupKind, number>;

/** A guard as placed on a floor, with the seed of its private patrol stream. */
export interface GuardSpawn {
  guard: GuardAgent;
  patrolSeed: Seed;
}

/** Everything a scheduler needs to start a floor. The grid is copied, never mutated. */
export interface FloorSetup {
  floorIndex: number;
  grid: ReadonlyGrid;
  start: Position;
  guards: GuardSpawn[];
}

export interface TurnSchedulerOptions {
  tuning?: GuardTuning;
  scoring?: Scoring;
  warn?: WarningSink;
}

export interface GuardView {
  id: GuardId;
  position: Position;
  facing: Direction;
  mode: GuardMode;
}

/** Read-only picture of a floor for renderers and input drivers. */
export interface FloorView {
  floorIndex: number;
  turn: number;
  status: FloorStatus;
  score: number;
  grid: ReadonlyGrid;
  player: { position: Position; inventory: Inventory };
  guards: GuardView[];
}

export type StepFeedback = {
  result: StealthResultCode;
  message: string;
} & Record<string, unknown>;

export type RejectionFeedback = {
  error: StealthErrorCode;
  message: string;
} & Record<string, unknown>;

export type StepResult =
  | { valid: true; turn: number; feedback: StepFeedback; events: SimEvent[] }
  | { valid: false; turn: number; feedback: RejectionFeedback; events: [] };

export type EventListener = (event: SimEvent) => void;

export interface TurnScheduler {
  readonly floorIndex: number;
  submit(action: PlayerAction): StepResult;
  view(): FloorView;
  status(): FloorStatus;
  turn(): number;
  score(): number;
  subscribe(listener: EventListener): () => void;
}

interface FloorState {
  grid: GridData;
  player: { position: Position; inventory: Inventory };
  guards: GuardAgent[];
  patrolStreams: SeededStream[];
  turn: number;
  status: FloorStatus;
  score: number;
  seq: number;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Builds live guards for a generated floor. Draws from `stream` (the floor
 * stream that produced the layout): one facing and one patrol seed per guard,
 * in spawn order.
 */
export function initializeFloor(floor: GenerationResult, stream: SeededStream): FloorSetup {
  const guards = floor.guardSpawns.map((spawn, index): GuardSpawn => {
    const facing = stream.pick(DIRECTION_ORDER) ?? "right";
    return {
      guard: createGuard(`guard-${index + 1}`, spawn, facing),
      patrolSeed: stream.deriveSeed(),
    };
  });
  return { floorIndex: floor.floorIndex, grid: floor.grid, start: floor.start, guards };
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export function createTurnScheduler(
  setup: FloorSetup,
  options: TurnSchedulerOptions = {},
): TurnScheduler {
  const tuning = options.tuning ?? DEFAULT_GUARD_TUNING;
  const scoring = options.scoring ?? DEFAULT_SCORING;
  const warn = options.warn ?? consoleWarningSink;
  const listeners = new Set<EventListener>();

  const state: FloorState = {
    grid: cloneGrid(setup.grid),
    player: {
      position: { x: setup.start.x, y: setup.start.y },
      inventory: { keycard: 0, objective: 0 },
    },
    guards: setup.guards.map(({ guard }) => ({
      ...guard,
      position: { ...guard.position },
      lastKnownTarget: guard.lastKnownTarget ? { ...guard.lastKnownTarget } : null,
    })),
    patrolStreams: setup.guards.map(({ patrolSeed }) => createSeededStream(patrolSeed)),
    turn: 0,
    status: "playing",
    score: 0,
    seq: 0,
  };

  const reject = (
    error: StealthErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): StepResult => ({
    valid: false,
    turn: state.turn,
    feedback: { error, message, ...(details ?? {}) },
    events: [],
  });

  const submit = (action: PlayerAction): StepResult => {
    if (state.status !== "playing") {
      return reject(STEALTH_ERROR_CODES.floor_over, `Floor is already ${state.status}.`, {
        status: state.status,
      });
    }
    const parsed = PlayerActionSchema.safeParse(action);
    if (!parsed.success) {
      return reject(
        STEALTH_ERROR_CODES.invalid_action_payload,
        parsed.error.issues.map(formatZodIssue).join("; "),
      );
    }

    const events: SimEvent[] = [];
    const emit = (partial: PendingEvent): void => {
      const event: SimEvent = {
        ...partial,
        seq: state.seq++,
        floorIndex: setup.floorIndex,
        turn: state.turn,
      };
      events.push(event);
    };

    const act = parsed.data;
    let feedback: StepFeedback;
    switch (act.type) {
      case "move": {
        const from = state.player.position;
        const to = offset(from, DIRECTION_VECTORS[act.direction]);
        if (!isWalkable(state.grid, to)) {
          return reject(STEALTH_ERROR_CODES.destination_blocked, "Destination is not walkable.", {
            from,
            to,
            tile: getTile(state.grid, to)?.kind ?? null,
          });
        }
        state.player.position = to;
        state.turn += 1;
        feedback = { result: STEALTH_RESULT_CODES.moved, message: "Moved.", position: to };
        break;
      }
      case "wait":
        state.turn += 1;
        feedback = { result: STEALTH_RESULT_CODES.waited, message: "Waited." };
        break;
      case "interact":
        state.turn += 1;
        feedback = interact(state, warn, emit);
        break;
    }

    resolveTile(state, tuning, scoring, warn, emit);
    runGuardPhase(state, tuning, emit);
    resolveTerminal(state, scoring, act.type === "move", emit);
    emit({ type: "TurnCompleted", playerPosition: { ...state.player.position } });

    for (const event of events) {
      for (const listener of listeners) {
        listener(event);
      }
    }
    return { valid: true, turn: state.turn, feedback, events };
  };

  const view = (): FloorView => ({
    floorIndex: setup.floorIndex,
    turn: state.turn,
    status: state.status,
    score: state.score,
    grid: cloneGrid(state.grid),
    player: {
      position: { ...state.player.position },
      inventory: { ...state.player.inventory },
    },
    guards: state.guards.map((guard) => ({
      id: guard.id,
      position: { ...guard.position },
      facing: guard.facing,
      mode: guard.mode,
    })),
  });

  return {
    floorIndex: setup.floorIndex,
    submit,
    view,
    status: () => state.status,
    turn: () => state.turn,
    score: () => state.score,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

type Emit = (partial: PendingEvent) => void;

function interact(state: FloorState, warn: WarningSink, emit: Emit): StepFeedback {
  const door = DIRECTION_ORDER.map((direction) =>
    offset(state.player.position, DIRECTION_VECTORS[direction]),
  ).find((pos) => {
    const tile = getTile(state.grid, pos);
    return tile?.kind === "door" && !tile.open;
  });
  if (!door) {
    return { result: STEALTH_RESULT_CODES.nothing_to_interact, message: "Nothing to interact with." };
  }
  if (state.player.inventory.keycard < 1) {
    return {
      result: STEALTH_RESULT_CODES.missing_keycard,
      message: "The door needs a keycard.",
      position: door,
    };
  }
  setTile(state.grid, door, { kind: "door", open: true }, warn);
  emit({ type: "DoorOpened", position: door });
  return { result: STEALTH_RESULT_CODES.door_opened, message: "Door opened.", position: door };
}

function resolveTile(
  state: FloorState,
  tuning: GuardTuning,
  scoring: Scoring,
  warn: WarningSink,
  emit: Emit,
): void {
  const position = state.player.position;
  const tile = getTile(state.grid, position);
  if (tile?.kind === "pickup") {
    state.player.inventory[tile.item] += 1;
    state.score += scoring[tile.item];
    setTile(state.grid, position, { kind: "floor" }, warn);
    emit({
      type: "PickupCollected",
      position: { ...position },
      item: tile.item,
      count: state.player.inventory[tile.item],
    });
    return;
  }
  if (tile?.kind === "hazard" && tile.armed) {
    setTile(state.grid, position, { kind: "hazard", armed: false }, warn);
    const changes: { index: number; from: GuardMode; to: GuardMode }[] = [];
    const alertedGuardIds: GuardId[] = [];
    state.guards.forEach((guard, index) => {
      if (manhattan(guard.position, position) > tuning.hazardAlertRadius) {
        return;
      }
      const transition = alertGuard(guard, position, tuning);
      if (guard.mode === "alert") {
        alertedGuardIds.push(guard.id);
      }
      if (transition) {
        changes.push({ index, ...transition });
      }
    });
    emit({
      type: "HazardTriggered",
      position: { ...position },
      radius: tuning.hazardAlertRadius,
      alertedGuardIds,
    });
    for (const change of changes) {
      const guard = state.guards[change.index];
      emit({
        type: "GuardStateChanged",
        guardId: guard.id,
        guardIndex: change.index,
        from: change.from,
        to: change.to,
        position: { ...guard.position },
      });
    }
  }
}

function runGuardPhase(state: FloorState, tuning: GuardTuning, emit: Emit): void {
  state.guards.forEach((guard, index) => {
    const outcome = stepGuard(guard, {
      grid: state.grid,
      playerPosition: state.player.position,
      tuning,
      patrolStream: state.patrolStreams[index],
    });
    if (outcome.transition) {
      emit({
        type: "GuardStateChanged",
        guardId: guard.id,
        guardIndex: index,
        from: outcome.transition.from,
        to: outcome.transition.to,
        position: { ...guard.position },
      });
    }
  });
}

function resolveTerminal(state: FloorState, scoring: Scoring, arrived: boolean, emit: Emit): void {
  const position = state.player.position;
  const captor = state.guards.find((guard) => samePosition(guard.position, position));
  if (captor) {
    state.status = "lost";
    emit({ type: "FloorLost", position: { ...position }, guardId: captor.id });
    return;
  }
  if (getTile(state.grid, position)?.kind !== "exit") {
    return;
  }
  if (state.player.inventory.objective > 0) {
    state.status = "won";
    state.score += scoring.floorCleared;
    emit({ type: "FloorWon", position: { ...position }, score: state.score });
  } else if (arrived) {
    emit({ type: "ExitLocked", position: { ...position } });
  }
}
