/** Numeric seed fed to a PRNG stream. */
export type Seed = number;

/** A run seed as entered by a player: free text is hashed, integers are used verbatim. */
export type RunSeed = string | number;

export type GuardId = string;

/** A JSON-serializable value (no functions, no undefined). */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Grid coordinate. `x` is the column, `y` the row; rows grow downward. */
export interface Position {
  x: number;
  y: number;
}

export type Direction = "up" | "down" | "left" | "right";

export type GuardMode = "patrol" | "alert" | "chase";

export type PickupKind = "keycard" | "objective";

export type FloorStatus = "playing" | "won" | "lost";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** Fields shared by every event. */
export interface BaseEvent {
  type: string;
  seq: number;
  floorIndex: number;
  turn: number;
}

export interface PickupCollectedEvent extends BaseEvent {
  type: "PickupCollected";
  position: Position;
  item: PickupKind;
  /** Count held after the pickup. */
  count: number;
}

export interface DoorOpenedEvent extends BaseEvent {
  type: "DoorOpened";
  position: Position;
}

export interface HazardTriggeredEvent extends BaseEvent {
  type: "HazardTriggered";
  position: Position;
  radius: number;
  alertedGuardIds: GuardId[];
}

export interface GuardStateChangedEvent extends BaseEvent {
  type: "GuardStateChanged";
  guardId: GuardId;
  guardIndex: number;
  from: GuardMode;
  to: GuardMode;
  position: Position;
}

export interface ExitLockedEvent extends BaseEvent {
  type: "ExitLocked";
  position: Position;
}

export interface TurnCompletedEvent extends BaseEvent {
  type: "TurnCompleted";
  playerPosition: Position;
}

export interface FloorWonEvent extends BaseEvent {
  type: "FloorWon";
  position: Position;
  score: number;
}

export interface FloorLostEvent extends BaseEvent {
  type: "FloorLost";
  position: Position;
  guardId: GuardId;
}

/** Discriminated union of all simulation events. */
export type SimEvent =
  | PickupCollectedEvent
  | DoorOpenedEvent
  | HazardTriggeredEvent
  | GuardStateChangedEvent
  | ExitLockedEvent
  | TurnCompletedEvent
  | FloorWonEvent
  | FloorLostEvent;

export type SimEventType = SimEvent["type"];

/** An event before the scheduler stamps `seq`, `floorIndex` and `turn` onto it. */
export type PendingEvent = Pending<SimEvent>;

type Pending<E extends SimEvent> = E extends SimEvent
  ? Omit<E, keyof BaseEvent> & { type: E["type"] }
  : never;
