/** Machine-readable error codes for rejected input */
export const STEALTH_ERROR_CODES = {
  // Action validation
  invalid_action_payload: "invalid_action_payload",
  floor_over: "floor_over",

  // Movement
  destination_blocked: "destination_blocked",
} as const;

export type StealthErrorCode = (typeof STEALTH_ERROR_CODES)[keyof typeof STEALTH_ERROR_CODES];

/** Machine-readable result codes for accepted input */
export const STEALTH_RESULT_CODES = {
  // Movement
  moved: "moved",
  waited: "waited",

  // Interaction
  door_opened: "door_opened",
  missing_keycard: "missing_keycard",
  nothing_to_interact: "nothing_to_interact",
} as const;

export type StealthResultCode = (typeof STEALTH_RESULT_CODES)[keyof typeof STEALTH_RESULT_CODES];
