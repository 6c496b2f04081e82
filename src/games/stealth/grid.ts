import type { Position } from "../../contract/types.js";
import {
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  type GridBounds,
  type GridData,
  type ReadonlyGrid,
  type Tile,
} from "./types.js";

export interface GridWarning {
  code: "tile_out_of_bounds";
  message: string;
  position: Position;
}

export type WarningSink = (warning: GridWarning) => void;

export const consoleWarningSink: WarningSink = (warning) => {
  console.warn(`[grid] ${warning.message}`);
};

export function createGrid(width: number, height: number): GridData {
  const tiles: Tile[] = [];
  for (let i = 0; i < width * height; i++) {
    tiles.push({ kind: "floor" });
  }
  return { width, height, tiles };
}

export function cloneGrid(grid: ReadonlyGrid): GridData {
  return {
    width: grid.width,
    height: grid.height,
    tiles: grid.tiles.map((tile) => ({ ...tile })),
  };
}

export const samePosition = (a: Position, b: Position): boolean => a.x === b.x && a.y === b.y;

export const manhattan = (a: Position, b: Position): number =>
  Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

export const offset = (pos: Position, delta: Position): Position => ({
  x: pos.x + delta.x,
  y: pos.y + delta.y,
});

export function inBounds(bounds: GridBounds, pos: Position): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.y >= 0 &&
    pos.x < bounds.width &&
    pos.y < bounds.height
  );
}

export const indexOf = (bounds: GridBounds, pos: Position): number => pos.y * bounds.width + pos.x;

export function getTile(grid: ReadonlyGrid, pos: Position): Readonly<Tile> | null {
  if (!inBounds(grid, pos)) {
    return null;
  }
  return grid.tiles[indexOf(grid, pos)] ?? { kind: "floor" };
}

/** Writes `tile` at `pos`. Out-of-bounds writes are dropped and reported as a warning. */
export function setTile(
  grid: GridData,
  pos: Position,
  tile: Tile,
  warn: WarningSink = consoleWarningSink,
): boolean {
  if (!inBounds(grid, pos)) {
    warn({
      code: "tile_out_of_bounds",
      message: `Ignored ${tile.kind} write outside ${grid.width}x${grid.height} grid at (${pos.x}, ${pos.y}).`,
      position: { x: pos.x, y: pos.y },
    });
    return false;
  }
  grid.tiles[indexOf(grid, pos)] = tile;
  return true;
}

export function isTileWalkable(tile: Readonly<Tile>): boolean {
  switch (tile.kind) {
    case "wall":
      return false;
    case "door":
      return tile.open;
    default:
      return true;
  }
}

export function blocksSight(tile: Readonly<Tile>): boolean {
  return tile.kind === "wall" || (tile.kind === "door" && !tile.open);
}

export function isWalkable(grid: ReadonlyGrid, pos: Position): boolean {
  const tile = getTile(grid, pos);
  return tile !== null && isTileWalkable(tile);
}

export function neighbors4(bounds: GridBounds, pos: Position): Position[] {
  const result: Position[] = [];
  for (const direction of DIRECTION_ORDER) {
    const next = offset(pos, DIRECTION_VECTORS[direction]);
    if (inBounds(bounds, next)) {
      result.push(next);
    }
  }
  return result;
}

/**
 * Row/column sight only: `a` sees `b` when they are the same cell, or share a
 * row or column with nothing blocking strictly between them. Diagonals never see.
 */
export function hasLineOfSight(grid: ReadonlyGrid, a: Position, b: Position): boolean {
  if (!inBounds(grid, a) || !inBounds(grid, b)) {
    return false;
  }
  if (samePosition(a, b)) {
    return true;
  }
  if (a.x !== b.x && a.y !== b.y) {
    return false;
  }
  const step = { x: Math.sign(b.x - a.x), y: Math.sign(b.y - a.y) };
  let cursor = offset(a, step);
  while (!samePosition(cursor, b)) {
    const tile = getTile(grid, cursor);
    if (tile === null || blocksSight(tile)) {
      return false;
    }
    cursor = offset(cursor, step);
  }
  return true;
}

export function listPositions(
  grid: ReadonlyGrid,
  predicate: (tile: Readonly<Tile>, pos: Position) => boolean,
): Position[] {
  const result: Position[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const pos = { x, y };
      const tile = grid.tiles[indexOf(grid, pos)];
      if (tile && predicate(tile, pos)) {
        result.push(pos);
      }
    }
  }
  return result;
}
