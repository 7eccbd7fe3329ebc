// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  x: number;
  y: number;
}

/** Width, height and impassable cells of the active map. */
export interface Grid {
  width: number;
  height: number;
  terrain: ReadonlySet<string>; // posKey() of every impassable cell
}

// ── Map configuration ────────────────────────────────────────
export interface MapConfig {
  name: string;
  width: number;
  height: number;
  terrain: Position[];
  entry: Position;        // evaders spawn here
  exit: Position;         // goal
  pursuerSpawns: Position[];
  pursuerCount?: number;  // defaults to pursuerSpawns.length; extras are placed from the run seed
}

export interface RunConfig {
  maps: MapConfig[];
  maxTicks: number;
  evaderCount: number;
  seed: number;
  roster?: string[];       // display names, indexed by evader number
  dangerDistance?: number;
  evaderSpeed?: number;
  pursuerSpeed?: number;
}

/** RunConfig with every optional tunable filled in. */
export interface ResolvedRunConfig extends RunConfig {
  roster: string[];
  dangerDistance: number;
  evaderSpeed: number;
  pursuerSpeed: number;
}

// ── Entities ─────────────────────────────────────────────────
export type EvaderId = string;
export type PursuerId = string;

export enum EntityRole {
  Evader = "evader",
  Pursuer = "pursuer",
}

export interface Evader {
  id: EvaderId;
  name: string;
  pos: Position;
}

export interface Pursuer {
  id: PursuerId;
  pos: Position;
}

// ── Outcomes ─────────────────────────────────────────────────
export enum Outcome {
  Victory = "victory",
  Defeat = "defeat",
  Timeout = "timeout",
}

export interface Tally {
  escaped: number;  // exit arrivals over the whole run
  captured: number;
}

// ── World state ──────────────────────────────────────────────
export interface WorldState {
  seed: number;
  mapIndex: number;
  mapCount: number;
  mapName: string;
  width: number;
  height: number;
  terrain: ReadonlySet<string>;
  entry: Position;
  exit: Position;
  evaders: Map<EvaderId, Evader>; // active only; insertion order is id order
  escaped: Evader[];              // reached this map's exit, stacked on it
  pursuers: Pursuer[];
  tick: number;                   // ticks on this map
  totalTicks: number;             // ticks over the whole run, never reset
  mapTicks: number[];             // tick count of each completed map
  tally: Tally;
  outcome: Outcome | null;
}

// ── Events ───────────────────────────────────────────────────
export enum EventKind {
  TurnStart = "turn_start",
  Moved = "moved",
  Evaded = "evaded",
  Escaped = "escaped",
  Captured = "captured",
  MapTransition = "map_transition",
  Victory = "victory",
  Defeat = "defeat",
  Timeout = "timeout",
}

interface EventBase {
  tick: number; // cumulative tick being executed, 1-based
  map: number;
}

export interface TurnStartEvent extends EventBase {
  kind: EventKind.TurnStart;
  mapTick: number;
  active: number;
}

export interface MovedEvent extends EventBase {
  kind: EventKind.Moved;
  entity: string;
  role: EntityRole;
  name?: string;
  from: Position;
  to: Position;
}

export interface EvadedEvent extends EventBase {
  kind: EventKind.Evaded;
  entity: EvaderId;
  name: string;
  pos: Position;
  threat: PursuerId;
  distance: number;
}

export interface EscapedEvent extends EventBase {
  kind: EventKind.Escaped;
  entity: EvaderId;
  name: string;
  pos: Position;
}

export interface CapturedEvent extends EventBase {
  kind: EventKind.Captured;
  entity: EvaderId;
  name: string;
  pos: Position;
  by: PursuerId;
}

export interface MapTransitionEvent extends EventBase {
  kind: EventKind.MapTransition;
  fromMapId: number;
  toMapId: number;
  carried: string[]; // names of the evaders moving on
}

export interface TerminalEvent extends EventBase {
  kind: EventKind.Victory | EventKind.Defeat | EventKind.Timeout;
  escaped: number;
  captured: number;
  totalTicks: number;
}

export type SimEvent =
  | TurnStartEvent
  | MovedEvent
  | EvadedEvent
  | EscapedEvent
  | CapturedEvent
  | MapTransitionEvent
  | TerminalEvent;

/** Anything that accepts event records. Must not feed back into the simulation. */
export interface EventSink {
  record(event: SimEvent): void;
}

// ── Results ──────────────────────────────────────────────────
export interface SimulationResult {
  outcome: Outcome;
  escaped: number;   // evaders on the exit of the map active at the end
  captured: number;
  totalArrivals: number; // exit arrivals summed over every map
  active: number;    // evaders still on the grid
  totalTicks: number;
  mapTicks: number[];
  finalWorld: WorldState;
  events?: SimEvent[];
}
