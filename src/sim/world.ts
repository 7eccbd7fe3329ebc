import * as ROT from "rot-js";
import type {
  Evader, EventSink, MapConfig, Position, Pursuer, ResolvedRunConfig, RunConfig, Tally, WorldState,
} from "../shared/types.js";
import { EventKind } from "../shared/types.js";
import { DANGER_DISTANCE, EVADER_SPEED, PURSUER_SPEED } from "../shared/constants.js";
import { DEFAULT_ROSTER } from "../data/roster.js";
import { ConfigError, InvariantError } from "./errors.js";
import { emit } from "./events.js";
import { distance, inBounds, isValidPosition, posKey, samePos, toTerrainSet } from "./geometry.js";

export type Rng = typeof ROT.RNG;

/** Per-run RNG so concurrent runs never share the rot-js global. */
export function createRng(seed: number): Rng {
  const rng = ROT.RNG.clone();
  rng.setSeed(seed);
  return rng;
}

export function resolveRunConfig(config: RunConfig): ResolvedRunConfig {
  return {
    ...config,
    roster: config.roster ?? DEFAULT_ROSTER,
    dangerDistance: config.dangerDistance ?? DANGER_DISTANCE,
    evaderSpeed: config.evaderSpeed ?? EVADER_SPEED,
    pursuerSpeed: config.pursuerSpeed ?? PURSUER_SPEED,
  };
}

// ── Validation ───────────────────────────────────────────────

function requireInt(value: number, min: number, field: string, mapIndex?: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `${mapIndex === undefined ? "" : `map ${mapIndex}: `}${field} must be an integer >= ${min} (got ${value})`,
      { field, mapIndex, value },
    );
  }
}

function requireCell(map: MapConfig, pos: Position, field: string, mapIndex: number): void {
  if (!Number.isInteger(pos.x) || !Number.isInteger(pos.y) || !inBounds(pos, map.width, map.height)) {
    throw new ConfigError(
      `map ${mapIndex}: ${field} (${pos.x},${pos.y}) is outside the ${map.width}x${map.height} grid`,
      { field, mapIndex, pos },
    );
  }
  if (map.terrain.some(t => samePos(t, pos))) {
    throw new ConfigError(`map ${mapIndex}: ${field} (${pos.x},${pos.y}) is inside terrain`, { field, mapIndex, pos });
  }
}

function validateMap(map: MapConfig, mapIndex: number): void {
  requireInt(map.width, 1, "width", mapIndex);
  requireInt(map.height, 1, "height", mapIndex);
  requireCell(map, map.entry, "entry", mapIndex);
  requireCell(map, map.exit, "exit", mapIndex);
  if (samePos(map.entry, map.exit)) {
    throw new ConfigError(`map ${mapIndex}: entry and exit are the same cell`, { field: "exit", mapIndex });
  }

  const seen = new Set<string>();
  map.pursuerSpawns.forEach((spawn, i) => {
    const field = `pursuerSpawns[${i}]`;
    requireCell(map, spawn, field, mapIndex);
    if (samePos(spawn, map.entry)) {
      throw new ConfigError(`map ${mapIndex}: ${field} is on the entry`, { field, mapIndex });
    }
    if (samePos(spawn, map.exit)) {
      throw new ConfigError(`map ${mapIndex}: ${field} is on the exit`, { field, mapIndex });
    }
    if (seen.has(posKey(spawn))) {
      throw new ConfigError(`map ${mapIndex}: ${field} duplicates another spawn`, { field, mapIndex });
    }
    seen.add(posKey(spawn));
  });

  if (map.pursuerCount !== undefined) {
    requireInt(map.pursuerCount, 0, "pursuerCount", mapIndex);
  }
}

/**
 * Reject anything that would make per-tick behavior undefined.
 * Throws ConfigError naming the offending map and field.
 */
export function validateRunConfig(config: RunConfig): ResolvedRunConfig {
  if (config.maps.length === 0) {
    throw new ConfigError("journey has no maps", { field: "maps" });
  }
  const resolved = resolveRunConfig(config);
  requireInt(resolved.maxTicks, 1, "maxTicks");
  requireInt(resolved.evaderCount, 1, "evaderCount");
  requireInt(resolved.seed, Number.MIN_SAFE_INTEGER, "seed");
  requireInt(resolved.dangerDistance, 0, "dangerDistance");
  requireInt(resolved.evaderSpeed, 1, "evaderSpeed");
  requireInt(resolved.pursuerSpeed, 0, "pursuerSpeed");
  if (resolved.roster.length === 0) {
    throw new ConfigError("roster is empty", { field: "roster" });
  }
  resolved.maps.forEach((map, i) => {
    validateMap(map, i);
    const walls = toTerrainSet(map.terrain.filter(t => inBounds(t, map.width, map.height))).size;
    const cells = map.width * map.height - walls - 1; // exit excluded
    const needed = resolved.evaderCount + (map.pursuerCount ?? map.pursuerSpawns.length);
    if (cells < needed) {
      throw new ConfigError(`map ${i}: ${cells} open cells cannot hold ${needed} evaders and pursuers`, {
        field: "evaderCount", mapIndex: i,
      });
    }
  });
  return resolved;
}

// ── Placement ────────────────────────────────────────────────

/** Valid cells in row-major order. */
function validCells(map: MapConfig, terrain: ReadonlySet<string>): Position[] {
  const cells: Position[] = [];
  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      const pos = { x, y };
      if (isValidPosition(pos, map.width, map.height, terrain)) cells.push(pos);
    }
  }
  return cells;
}

/** Valid cells ordered by distance from `origin`, then row, then column. */
function cellsByDistance(map: MapConfig, terrain: ReadonlySet<string>, origin: Position): Position[] {
  return validCells(map, terrain).sort((a, b) => distance(a, origin) - distance(b, origin) || a.y - b.y || a.x - b.x);
}

/**
 * Put evaders on the entry. The first takes the entry itself; each later one
 * takes the nearest free cell so nobody starts stacked.
 */
function placeEvaders(
  map: MapConfig,
  mapIndex: number,
  terrain: ReadonlySet<string>,
  evaders: { id: string; name: string }[],
  blocked: Set<string>,
): Map<string, Evader> {
  const placed = new Map<string, Evader>();
  const candidates = cellsByDistance(map, terrain, map.entry).filter(c => !samePos(c, map.exit));
  let next = 0;
  for (const e of evaders) {
    while (next < candidates.length && blocked.has(posKey(candidates[next]))) next++;
    if (next >= candidates.length) {
      throw new ConfigError(`map ${mapIndex}: no free cell left to spawn ${e.name}`, { field: "evaderCount", mapIndex });
    }
    const pos = candidates[next++];
    blocked.add(posKey(pos));
    placed.set(e.id, { id: e.id, name: e.name, pos });
  }
  return placed;
}

/**
 * Configured spawns first, then seeded random cells for any extra count.
 * Random cells keep clear of the entry by more than the danger distance
 * when the grid allows it.
 */
function placePursuers(
  map: MapConfig,
  mapIndex: number,
  terrain: ReadonlySet<string>,
  blocked: Set<string>,
  rng: Rng,
  dangerDistance: number,
): Pursuer[] {
  const count = map.pursuerCount ?? map.pursuerSpawns.length;
  const pursuers: Pursuer[] = [];

  for (const spawn of map.pursuerSpawns.slice(0, count)) {
    pursuers.push({ id: `pursuer_${pursuers.length}`, pos: { ...spawn } });
    blocked.add(posKey(spawn));
  }

  const free = (pos: Position, minDist: number) =>
    isValidPosition(pos, map.width, map.height, terrain) &&
    !blocked.has(posKey(pos)) &&
    !samePos(pos, map.exit) &&
    distance(pos, map.entry) >= minDist;

  const farEnough = dangerDistance + 1;
  while (pursuers.length < count) {
    let pos: Position | null = null;
    for (let attempt = 0; attempt < 100 && !pos; attempt++) {
      const candidate = {
        x: Math.floor(rng.getUniform() * map.width),
        y: Math.floor(rng.getUniform() * map.height),
      };
      if (free(candidate, farEnough)) pos = candidate;
    }
    // Deterministic fallback: row-major scan, relaxing the distance rule last
    if (!pos) {
      const cells = validCells(map, terrain);
      pos = cells.find(c => free(c, farEnough)) ?? cells.find(c => free(c, 1)) ?? null;
    }
    if (!pos) {
      throw new ConfigError(`map ${mapIndex}: no free cell left to spawn pursuer ${pursuers.length}`, {
        field: "pursuerCount", mapIndex,
      });
    }
    pursuers.push({ id: `pursuer_${pursuers.length}`, pos });
    blocked.add(posKey(pos));
  }
  return pursuers;
}

// ── Construction ─────────────────────────────────────────────

export interface RunProgress {
  totalTicks: number;
  mapTicks: number[];
  tally: Tally;
}

/**
 * Fresh world for `config.maps[mapIndex]` holding `evaders` (their old
 * positions are ignored). Tick counters and tallies carry over from `prior`.
 */
export function createWorld(
  config: ResolvedRunConfig,
  mapIndex: number,
  evaders: { id: string; name: string }[],
  rng: Rng,
  prior: RunProgress = { totalTicks: 0, mapTicks: [], tally: { escaped: 0, captured: 0 } },
): WorldState {
  const map = config.maps[mapIndex];
  const terrain = toTerrainSet(map.terrain);
  const blocked = new Set<string>();
  const pursuers = placePursuers(map, mapIndex, terrain, blocked, rng, config.dangerDistance);

  return {
    seed: config.seed,
    mapIndex,
    mapCount: config.maps.length,
    mapName: map.name,
    width: map.width,
    height: map.height,
    terrain,
    entry: { ...map.entry },
    exit: { ...map.exit },
    evaders: placeEvaders(map, mapIndex, terrain, evaders, blocked),
    escaped: [],
    pursuers,
    tick: 0,
    totalTicks: prior.totalTicks,
    mapTicks: [...prior.mapTicks],
    tally: { ...prior.tally },
    outcome: null,
  };
}

export interface Simulation {
  config: ResolvedRunConfig;
  rng: Rng;
  world: WorldState;
}

/** Validate the configuration and build the first map. */
export function createSimulation(config: RunConfig): Simulation {
  const resolved = validateRunConfig(config);
  const rng = createRng(resolved.seed);
  const evaders = Array.from({ length: resolved.evaderCount }, (_, i) => ({
    id: `evader_${i}`,
    name: resolved.roster[i % resolved.roster.length],
  }));
  const world = createWorld(resolved, 0, evaders, rng);
  checkInvariants(world);
  return { config: resolved, rng, world };
}

/**
 * Move the evaders that reached this map's exit onto `maps[nextIndex]`.
 * Captured evaders stay gone. The finished map's tick count is appended to
 * mapTicks; totalTicks keeps running.
 */
export function transitionToNextMap(
  world: WorldState,
  config: ResolvedRunConfig,
  nextIndex: number,
  rng: Rng,
  sink?: EventSink,
): WorldState {
  if (nextIndex < 0 || nextIndex >= config.maps.length) {
    throw new InvariantError(
      `cannot transition from map ${world.mapIndex} to map ${nextIndex}: journey has ${config.maps.length} maps`,
      { mapIndex: world.mapIndex, nextIndex, tick: world.totalTicks },
    );
  }

  const next = createWorld(config, nextIndex, world.escaped, rng, {
    totalTicks: world.totalTicks,
    mapTicks: [...world.mapTicks, world.tick],
    tally: world.tally,
  });

  emit(sink, {
    kind: EventKind.MapTransition,
    tick: world.totalTicks,
    map: world.mapIndex,
    fromMapId: world.mapIndex,
    toMapId: nextIndex,
    carried: world.escaped.map(e => e.name),
  });

  checkInvariants(next);
  return next;
}

// ── Invariants ───────────────────────────────────────────────

/**
 * Every entity on a valid cell; no two pursuers together; no two evaders
 * together except on the exit.
 */
export function checkInvariants(world: WorldState, tick: number = world.totalTicks): void {
  const evaderCells = new Map<string, string>();
  for (const [id, e] of world.evaders) {
    if (!isValidPosition(e.pos, world.width, world.height, world.terrain)) {
      throw new InvariantError(`${id} at (${e.pos.x},${e.pos.y}) is off the grid or on terrain at tick ${tick}`, {
        entity: id, pos: e.pos, tick,
      });
    }
    const key = posKey(e.pos);
    const other = evaderCells.get(key);
    if (other !== undefined && !samePos(e.pos, world.exit)) {
      throw new InvariantError(`${id} and ${other} share (${e.pos.x},${e.pos.y}) at tick ${tick}`, {
        entity: id, other, pos: e.pos, tick,
      });
    }
    evaderCells.set(key, id);
  }

  const pursuerCells = new Map<string, string>();
  for (const p of world.pursuers) {
    if (!isValidPosition(p.pos, world.width, world.height, world.terrain)) {
      throw new InvariantError(`${p.id} at (${p.pos.x},${p.pos.y}) is off the grid or on terrain at tick ${tick}`, {
        entity: p.id, pos: p.pos, tick,
      });
    }
    const key = posKey(p.pos);
    const other = pursuerCells.get(key);
    if (other !== undefined) {
      throw new InvariantError(`${p.id} and ${other} share (${p.pos.x},${p.pos.y}) at tick ${tick}`, {
        entity: p.id, other, pos: p.pos, tick,
      });
    }
    pursuerCells.set(key, p.id);
  }
}
