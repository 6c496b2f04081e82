import type { Direction, GuardId, GuardMode, Position } from "../../contract/types.js";
import type { SeededStream } from "../../core/rng.js";
import {
  getTile,
  hasLineOfSight,
  isTileWalkable,
  isWalkable,
  manhattan,
  offset,
  samePosition,
} from "./grid.js";
import { cheapestPath, shortestPath } from "./pathfinding.js";
import {
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  type GuardTuning,
  type ReadonlyGrid,
} from "./types.js";

/** A guard's mutable record. Owned by the turn scheduler's roster. */
export interface GuardAgent {
  id: GuardId;
  position: Position;
  facing: Direction;
  mode: GuardMode;
  /** Turns of pursuit or investigation left before falling back to patrol. */
  turnsRemaining: number;
  /** Activations to skip after entering slow terrain. */
  cooldown: number;
  lastKnownTarget: Position | null;
}

export interface GuardContext {
  grid: ReadonlyGrid;
  playerPosition: Position;
  tuning: GuardTuning;
  /** The guard's own stream, derived from the floor stream at initialization. */
  patrolStream: SeededStream;
}

export interface ModeTransition {
  from: GuardMode;
  to: GuardMode;
}

export interface GuardStepOutcome {
  /** True when the activation was spent on cooldown. */
  skipped: boolean;
  moved: boolean;
  transition: ModeTransition | null;
}

export function createGuard(id: GuardId, position: Position, facing: Direction = "right"): GuardAgent {
  return {
    id,
    position: { x: position.x, y: position.y },
    facing,
    mode: "patrol",
    turnsRemaining: 0,
    cooldown: 0,
    lastKnownTarget: null,
  };
}

export function canSeePlayer(
  grid: ReadonlyGrid,
  guard: Pick<GuardAgent, "position">,
  playerPosition: Position,
  visionRange: number,
): boolean {
  return (
    manhattan(guard.position, playerPosition) <= visionRange &&
    hasLineOfSight(grid, guard.position, playerPosition)
  );
}

const enterPatrol = (guard: GuardAgent): void => {
  guard.mode = "patrol";
  guard.turnsRemaining = 0;
  guard.lastKnownTarget = null;
};

const directionBetween = (from: Position, to: Position): Direction | null =>
  DIRECTION_ORDER.find((direction) =>
    samePosition(offset(from, DIRECTION_VECTORS[direction]), to),
  ) ?? null;

function perceive(guard: GuardAgent, ctx: GuardContext): void {
  if (canSeePlayer(ctx.grid, guard, ctx.playerPosition, ctx.tuning.visionRange)) {
    guard.mode = "chase";
    guard.turnsRemaining = ctx.tuning.chaseDuration;
    guard.lastKnownTarget = { x: ctx.playerPosition.x, y: ctx.playerPosition.y };
    return;
  }
  if (guard.mode === "patrol") {
    return;
  }
  guard.turnsRemaining -= 1;
  if (guard.turnsRemaining <= 0) {
    enterPatrol(guard);
  }
}

function moveTo(guard: GuardAgent, grid: ReadonlyGrid, next: Position): void {
  guard.position = { x: next.x, y: next.y };
  const tile = getTile(grid, next);
  if (tile?.kind === "slow") {
    guard.cooldown = Math.max(0, tile.cost - 1);
  }
}

function patrolStep(guard: GuardAgent, ctx: GuardContext): boolean {
  const ahead = offset(guard.position, DIRECTION_VECTORS[guard.facing]);
  if (isWalkable(ctx.grid, ahead)) {
    moveTo(guard, ctx.grid, ahead);
    return true;
  }
  const open = DIRECTION_ORDER.filter((direction) =>
    isWalkable(ctx.grid, offset(guard.position, DIRECTION_VECTORS[direction])),
  );
  const choice = ctx.patrolStream.pick(open);
  if (choice === undefined) {
    return false;
  }
  guard.facing = choice;
  moveTo(guard, ctx.grid, offset(guard.position, DIRECTION_VECTORS[choice]));
  return true;
}

function pursuitPath(guard: GuardAgent, ctx: GuardContext, target: Position): Position[] {
  if (ctx.tuning.terrainAwarePursuit) {
    return cheapestPath(
      ctx.grid,
      (pos) => {
        const tile = getTile(ctx.grid, pos);
        if (tile === null || !isTileWalkable(tile)) {
          return null;
        }
        return tile.kind === "slow" ? tile.cost : 1;
      },
      guard.position,
      target,
    ).path;
  }
  return shortestPath(ctx.grid, (pos) => isWalkable(ctx.grid, pos), guard.position, target);
}

function pursueStep(guard: GuardAgent, ctx: GuardContext): boolean {
  const target = guard.lastKnownTarget;
  if (!target) {
    return false;
  }
  const path = pursuitPath(guard, ctx, target);
  if (path.length < 2) {
    return false;
  }
  const next = path[1];
  guard.facing = directionBetween(guard.position, next) ?? guard.facing;
  moveTo(guard, ctx.grid, next);
  return true;
}

/**
 * One activation: perceive, update mode and timers, then move one cell.
 * A guard on cooldown only burns one cooldown tick.
 */
export function stepGuard(guard: GuardAgent, ctx: GuardContext): GuardStepOutcome {
  if (guard.cooldown > 0) {
    guard.cooldown -= 1;
    return { skipped: true, moved: false, transition: null };
  }

  const from = guard.mode;
  perceive(guard, ctx);

  const moved = guard.mode === "patrol" ? patrolStep(guard, ctx) : pursueStep(guard, ctx);

  if (
    guard.mode === "alert" &&
    guard.lastKnownTarget &&
    samePosition(guard.position, guard.lastKnownTarget)
  ) {
    enterPatrol(guard);
  }

  return {
    skipped: false,
    moved,
    transition: from === guard.mode ? null : { from, to: guard.mode },
  };
}

/**
 * Sends a guard to investigate `source`. Guards already chasing ignore the
 * noise. Returns the transition when the mode changed.
 */
export function alertGuard(
  guard: GuardAgent,
  source: Position,
  tuning: GuardTuning,
): ModeTransition | null {
  if (guard.mode === "chase") {
    return null;
  }
  const from = guard.mode;
  guard.mode = "alert";
  guard.turnsRemaining = tuning.alertDuration;
  guard.lastKnownTarget = { x: source.x, y: source.y };
  return from === "alert" ? null : { from, to: "alert" };
}
