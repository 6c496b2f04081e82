import type { InputAgent } from "../contract/interfaces.js";
import type { Direction, Position } from "../contract/types.js";
import { isWalkable, listPositions, offset, samePosition } from "../games/stealth/grid.js";
import { shortestPath } from "../games/stealth/pathfinding.js";
import {
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  type PlayerAction,
  type ReadonlyGrid,
} from "../games/stealth/types.js";
import type { FloorView } from "../scenarios/stealth/index.js";

const directionTo = (from: Position, to: Position): Direction | undefined =>
  DIRECTION_ORDER.find((direction) => samePosition(offset(from, DIRECTION_VECTORS[direction]), to));

/** Shortest walkable path to the nearest goal; goal cells themselves may be closed doors. */
function nearestPath(grid: ReadonlyGrid, from: Position, goals: Position[]): Position[] {
  let best: Position[] = [];
  for (const goal of goals) {
    const path = shortestPath(
      grid,
      (pos) => samePosition(pos, goal) || isWalkable(grid, pos),
      from,
      goal,
    );
    if (path.length > 0 && (best.length === 0 || path.length < best.length)) {
      best = path;
    }
  }
  return best;
}

/**
 * Greedy objective runner. Ignores guards. Heads for the objective, then the
 * exit; when walled off by doors it collects a keycard and opens the nearest
 * closed door.
 */
export function createSeekerAgent(id = "seeker"): InputAgent {
  const plan = (view: FloorView): PlayerAction => {
    const { grid, player } = view;
    const here = player.position;
    const step = (path: Position[]): PlayerAction | null => {
      if (path.length < 2) {
        return null;
      }
      const direction = directionTo(here, path[1]);
      return direction ? { type: "move", direction } : null;
    };

    const target =
      player.inventory.objective > 0
        ? listPositions(grid, (tile) => tile.kind === "exit")
        : listPositions(grid, (tile) => tile.kind === "pickup" && tile.item === "objective");
    const direct = step(nearestPath(grid, here, target));
    if (direct) {
      return direct;
    }

    if (player.inventory.keycard === 0) {
      const keys = listPositions(grid, (tile) => tile.kind === "pickup" && tile.item === "keycard");
      return step(nearestPath(grid, here, keys)) ?? { type: "wait" };
    }

    const doors = listPositions(grid, (tile) => tile.kind === "door" && !tile.open);
    const toDoor = nearestPath(grid, here, doors);
    if (toDoor.length === 2) {
      return { type: "interact" };
    }
    return step(toDoor) ?? { type: "wait" };
  };

  return { id, act: plan };
}
