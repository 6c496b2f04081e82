import type { InputAgent } from "../contract/interfaces.js";
import type { Seed } from "../contract/types.js";
import { createSeededStream } from "../core/rng.js";
import { getTile, isWalkable, offset } from "../games/stealth/grid.js";
import { DIRECTION_ORDER, DIRECTION_VECTORS, type PlayerAction } from "../games/stealth/types.js";

/**
 * Wanders on its own seeded stream: a uniform pick among the walkable moves,
 * plus `interact` when a closed door is adjacent. Waits when boxed in.
 */
export function createRandomAgent(seed: Seed, id = "random"): InputAgent {
  const stream = createSeededStream(seed);
  return {
    id,
    act(view): PlayerAction {
      const here = view.player.position;
      const options: PlayerAction[] = [];
      for (const direction of DIRECTION_ORDER) {
        const next = offset(here, DIRECTION_VECTORS[direction]);
        if (isWalkable(view.grid, next)) {
          options.push({ type: "move", direction });
        } else if (getTile(view.grid, next)?.kind === "door") {
          options.push({ type: "interact" });
        }
      }
      return stream.pick(options) ?? { type: "wait" };
    },
  };
}
