import type { GuardMode, Position } from "../../contract/types.js";
import type { ReadonlyGrid, Tile } from "./types.js";

const tileSymbol = (tile: Readonly<Tile>): string => {
  switch (tile.kind) {
    case "floor":
      return ".";
    case "wall":
      return "#";
    case "door":
      return tile.open ? "/" : "+";
    case "exit":
      return "E";
    case "hazard":
      return tile.armed ? "^" : "_";
    case "slow":
      return "~";
    case "pickup":
      return tile.item === "objective" ? "O" : "k";
  }
};

const GUARD_SYMBOLS: Record<GuardMode, string> = {
  patrol: "g",
  alert: "?",
  chase: "G",
};

export interface RenderMarks {
  player?: Position;
  start?: Position;
  guards?: readonly { position: Position; mode: GuardMode }[];
}

export const LEGEND =
  "# wall  . floor  + door  / open door  E exit  ^ hazard  ~ slow  O objective  k keycard  " +
  "S start  @ player  g/?/G guard (patrol/alert/chase)";

/** One line per row. Marks overwrite tiles; the player wins over guards. */
export function renderGrid(grid: ReadonlyGrid, marks: RenderMarks = {}): string[] {
  const rows: string[][] = [];
  for (let y = 0; y < grid.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < grid.width; x++) {
      const tile = grid.tiles[y * grid.width + x];
      row.push(tile ? tileSymbol(tile) : " ");
    }
    rows.push(row);
  }
  const mark = (pos: Position | undefined, symbol: string): void => {
    if (pos && rows[pos.y] && pos.x >= 0 && pos.x < grid.width) {
      rows[pos.y][pos.x] = symbol;
    }
  };
  mark(marks.start, "S");
  for (const guard of marks.guards ?? []) {
    mark(guard.position, GUARD_SYMBOLS[guard.mode]);
  }
  mark(marks.player, "@");
  return rows.map((row) => row.join(""));
}
