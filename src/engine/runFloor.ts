import type { InputAgent } from "../contract/interfaces.js";
import type { FloorStatus, SimEvent } from "../contract/types.js";
import type { PlayerAction } from "../games/stealth/types.js";
import type { FloorView, StepResult } from "../scenarios/stealth/index.js";

/** Anything that takes one action per step: a floor scheduler or a whole run. */
export interface Drivable {
  view(): FloorView;
  submit(action: PlayerAction): StepResult;
  status(): FloorStatus;
}

export interface RunFloorOptions {
  /** Upper bound on submitted actions, rejected ones included. */
  maxSteps: number;
}

export interface RunFloorResult {
  status: FloorStatus;
  steps: number;
  rejected: number;
  events: SimEvent[];
}

/** Drives `target` with `agent` until it leaves `playing` or the step budget runs out. */
export function runFloor(
  target: Drivable,
  agent: InputAgent,
  options: RunFloorOptions,
): RunFloorResult {
  const events: SimEvent[] = [];
  let steps = 0;
  let rejected = 0;

  while (target.status() === "playing" && steps < options.maxSteps) {
    const result = target.submit(agent.act(target.view()));
    steps += 1;
    if (!result.valid) {
      rejected += 1;
      continue;
    }
    events.push(...result.events);
  }

  return { status: target.status(), steps, rejected, events };
}
