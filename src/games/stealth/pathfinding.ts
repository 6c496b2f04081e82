import type { Position } from "../../contract/types.js";
import { inBounds, indexOf, neighbors4, samePosition } from "./grid.js";
import type { GridBounds } from "./types.js";

export type PassablePredicate = (pos: Position) => boolean;

/** Cost to enter `pos`, or `null` when the cell cannot be entered. */
export type StepCost = (pos: Position) => number | null;

const rebuildPath = (
  bounds: GridBounds,
  previous: Map<number, Position>,
  start: Position,
  goal: Position,
): Position[] => {
  const path: Position[] = [goal];
  let cursor = goal;
  while (!samePosition(cursor, start)) {
    const prev = previous.get(indexOf(bounds, cursor));
    if (!prev) {
      return [];
    }
    cursor = prev;
    path.push(cursor);
  }
  return path.reverse();
};

/**
 * Breadth-first shortest path over 4-connected cells. Returns the full
 * waypoint list including both endpoints, `[start]` when start equals goal,
 * and `[]` when either endpoint is out of bounds or impassable, or when the
 * goal cannot be reached. Equal-length paths are resolved by neighbor order.
 */
export function shortestPath(
  bounds: GridBounds,
  passable: PassablePredicate,
  start: Position,
  goal: Position,
): Position[] {
  if (!inBounds(bounds, start) || !inBounds(bounds, goal)) {
    return [];
  }
  if (!passable(start) || !passable(goal)) {
    return [];
  }
  if (samePosition(start, goal)) {
    return [{ x: start.x, y: start.y }];
  }

  const visited = new Set<number>([indexOf(bounds, start)]);
  const previous = new Map<number, Position>();
  const queue: Position[] = [start];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    for (const neighbor of neighbors4(bounds, current)) {
      const key = indexOf(bounds, neighbor);
      if (visited.has(key) || !passable(neighbor)) {
        continue;
      }
      visited.add(key);
      previous.set(key, current);
      if (samePosition(neighbor, goal)) {
        return rebuildPath(bounds, previous, start, goal);
      }
      queue.push(neighbor);
    }
  }
  return [];
}

export function isReachable(
  bounds: GridBounds,
  passable: PassablePredicate,
  start: Position,
  goal: Position,
): boolean {
  return shortestPath(bounds, passable, start, goal).length > 0;
}

/** Every cell reachable from `start`, keyed by row-major index. */
export function reachableSet(
  bounds: GridBounds,
  passable: PassablePredicate,
  start: Position,
): Set<number> {
  const reachable = new Set<number>();
  if (!inBounds(bounds, start) || !passable(start)) {
    return reachable;
  }
  reachable.add(indexOf(bounds, start));
  const queue: Position[] = [start];
  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    for (const neighbor of neighbors4(bounds, current)) {
      const key = indexOf(bounds, neighbor);
      if (reachable.has(key) || !passable(neighbor)) {
        continue;
      }
      reachable.add(key);
      queue.push(neighbor);
    }
  }
  return reachable;
}

// ---------------------------------------------------------------------------
// Cost-weighted variant
// ---------------------------------------------------------------------------

interface FrontierEntry {
  pos: Position;
  cost: number;
  order: number;
}

const before = (a: FrontierEntry, b: FrontierEntry): boolean =>
  a.cost < b.cost || (a.cost === b.cost && a.order < b.order);

/** Binary min-heap keyed on (cost, insertion order). */
class Frontier {
  private readonly heap: FrontierEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(entry: FrontierEntry): void {
    const heap = this.heap;
    heap.push(entry);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) {
        break;
      }
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  pop(): FrontierEntry | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const left = i * 2 + 1;
        const right = left + 1;
        let smallest = i;
        if (left < heap.length && before(heap[left], heap[smallest])) {
          smallest = left;
        }
        if (right < heap.length && before(heap[right], heap[smallest])) {
          smallest = right;
        }
        if (smallest === i) {
          break;
        }
        [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
        i = smallest;
      }
    }
    return top;
  }
}

export interface CostedPath {
  path: Position[];
  cost: number;
}

/**
 * Uniform-cost search. The start cell is free; every other cell costs what
 * `stepCost` says to enter. Same endpoint rules as {@link shortestPath}; an
 * unreachable goal yields `{ path: [], cost: Infinity }`.
 */
export function cheapestPath(
  bounds: GridBounds,
  stepCost: StepCost,
  start: Position,
  goal: Position,
): CostedPath {
  const none: CostedPath = { path: [], cost: Number.POSITIVE_INFINITY };
  if (!inBounds(bounds, start) || !inBounds(bounds, goal)) {
    return none;
  }
  if (stepCost(start) === null || stepCost(goal) === null) {
    return none;
  }
  if (samePosition(start, goal)) {
    return { path: [{ x: start.x, y: start.y }], cost: 0 };
  }

  const best = new Map<number, number>([[indexOf(bounds, start), 0]]);
  const previous = new Map<number, Position>();
  const settled = new Set<number>();
  const frontier = new Frontier();
  let order = 0;
  frontier.push({ pos: start, cost: 0, order: order++ });

  while (frontier.size > 0) {
    const entry = frontier.pop();
    if (!entry) {
      break;
    }
    const key = indexOf(bounds, entry.pos);
    if (settled.has(key)) {
      continue;
    }
    settled.add(key);
    if (samePosition(entry.pos, goal)) {
      return { path: rebuildPath(bounds, previous, start, goal), cost: entry.cost };
    }
    for (const neighbor of neighbors4(bounds, entry.pos)) {
      const neighborKey = indexOf(bounds, neighbor);
      if (settled.has(neighborKey)) {
        continue;
      }
      const enter = stepCost(neighbor);
      if (enter === null) {
        continue;
      }
      const total = entry.cost + enter;
      const known = best.get(neighborKey);
      if (known !== undefined && known <= total) {
        continue;
      }
      best.set(neighborKey, total);
      previous.set(neighborKey, entry.pos);
      frontier.push({ pos: neighbor, cost: total, order: order++ });
    }
  }
  return none;
}
