import type { InputAgent } from "../contract/interfaces.js";
import type { PlayerAction } from "../games/stealth/types.js";

/** Replays a fixed list of actions, then waits forever. */
export function createScriptedAgent(actions: readonly PlayerAction[], id = "scripted"): InputAgent {
  let cursor = 0;
  return {
    id,
    act(): PlayerAction {
      const next = actions[cursor];
      if (next === undefined) {
        return { type: "wait" };
      }
      cursor += 1;
      return next;
    },
  };
}
