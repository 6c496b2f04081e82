import type { PlayerAction } from "../games/stealth/types.js";
import type { FloorView } from "../scenarios/stealth/index.js";

// ---------------------------------------------------------------------------
// Input agent
// ---------------------------------------------------------------------------

/** Maps what the player can see to one action per step. */
export interface InputAgent {
  readonly id: string;
  act(view: FloorView): PlayerAction;
}
