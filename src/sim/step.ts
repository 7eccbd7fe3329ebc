import type { Evader, EventSink, ResolvedRunConfig, RunConfig, SimulationResult, WorldState } from "../shared/types.js";
import { EntityRole, EventKind, Outcome } from "../shared/types.js";
import { EventCollector, MultiSink, emit } from "./events.js";
import { posKey, samePos } from "./geometry.js";
import { buildResult, checkOutcome } from "./outcome.js";
import { decideEvader, decidePursuer } from "./policies.js";
import { checkInvariants, createSimulation, transitionToNextMap } from "./world.js";
import type { Rng } from "./world.js";

/**
 * Evader phase. Every evader decides against the pursuer positions from the
 * end of the previous tick; evaders themselves move one at a time in id
 * order so later ones see where earlier ones went.
 */
function moveEvaders(world: WorldState, config: ResolvedRunConfig, tick: number, sink?: EventSink): WorldState {
  const pursuerCells = new Set(world.pursuers.map(p => posKey(p.pos)));
  const evaderCells = new Set(Array.from(world.evaders.values(), e => posKey(e.pos)));
  const exitKey = posKey(world.exit);

  const evaders = new Map<string, Evader>();
  const escaped = [...world.escaped];
  let escapedCount = world.tally.escaped;

  for (const [id, evader] of world.evaders) {
    evaderCells.delete(posKey(evader.pos));
    // Evaders may stack on the exit; a pursuer standing there still blocks it
    const others = new Set(evaderCells);
    others.delete(exitKey);
    const occupied = new Set([...others, ...pursuerCells]);

    const decision = decideEvader(
      evader, world.exit, world.pursuers, world, occupied, config.dangerDistance, config.evaderSpeed,
    );

    if (decision.threat) {
      emit(sink, {
        kind: EventKind.Evaded,
        tick,
        map: world.mapIndex,
        entity: id,
        name: evader.name,
        pos: evader.pos,
        threat: decision.threat.entity.id,
        distance: decision.threat.distance,
      });
    }

    const moved: Evader = { ...evader, pos: decision.pos };
    if (!samePos(moved.pos, evader.pos)) {
      emit(sink, {
        kind: EventKind.Moved,
        tick,
        map: world.mapIndex,
        entity: id,
        role: EntityRole.Evader,
        name: evader.name,
        from: evader.pos,
        to: moved.pos,
      });
    }

    if (samePos(moved.pos, world.exit)) {
      escaped.push(moved);
      escapedCount++;
      emit(sink, { kind: EventKind.Escaped, tick, map: world.mapIndex, entity: id, name: evader.name, pos: moved.pos });
    } else {
      evaders.set(id, moved);
      evaderCells.add(posKey(moved.pos));
    }
  }

  return { ...world, evaders, escaped, tally: { ...world.tally, escaped: escapedCount } };
}

/**
 * Pursuer phase. Targets come from the evader positions after the evader
 * phase; pursuers only block each other.
 */
function movePursuers(world: WorldState, config: ResolvedRunConfig, tick: number, sink?: EventSink): WorldState {
  const targets = Array.from(world.evaders.values());
  const pursuerCells = new Set(world.pursuers.map(p => posKey(p.pos)));

  const pursuers = world.pursuers.map(pursuer => {
    pursuerCells.delete(posKey(pursuer.pos));
    const decision = decidePursuer(pursuer, targets, world, pursuerCells, config.pursuerSpeed);
    pursuerCells.add(posKey(decision.pos));

    if (samePos(decision.pos, pursuer.pos)) return pursuer;
    emit(sink, {
      kind: EventKind.Moved,
      tick,
      map: world.mapIndex,
      entity: pursuer.id,
      role: EntityRole.Pursuer,
      from: pursuer.pos,
      to: decision.pos,
    });
    return { ...pursuer, pos: decision.pos };
  });

  return { ...world, pursuers };
}

/** Any evader sharing a cell with a pursuer is caught. Runs once per tick. */
function resolveCaptures(world: WorldState, tick: number, sink?: EventSink): WorldState {
  const evaders = new Map<string, Evader>();
  let captured = world.tally.captured;

  for (const [id, evader] of world.evaders) {
    const catcher = world.pursuers.find(p => samePos(p.pos, evader.pos));
    if (!catcher) {
      evaders.set(id, evader);
      continue;
    }
    captured++;
    emit(sink, {
      kind: EventKind.Captured,
      tick,
      map: world.mapIndex,
      entity: id,
      name: evader.name,
      pos: evader.pos,
      by: catcher.id,
    });
  }

  if (captured === world.tally.captured) return world;
  return { ...world, evaders, tally: { ...world.tally, captured } };
}

const TERMINAL_EVENTS = {
  [Outcome.Victory]: EventKind.Victory,
  [Outcome.Defeat]: EventKind.Defeat,
  [Outcome.Timeout]: EventKind.Timeout,
} as const;

/**
 * Advance the world by one tick: evaders, pursuers, captures, counters,
 * then outcome or map transition. Returns a new state; the input is left
 * untouched. A finished world is returned as is.
 */
export function tick(world: WorldState, config: ResolvedRunConfig, rng: Rng, sink?: EventSink): WorldState {
  if (world.outcome) return world;

  const tickNo = world.totalTicks + 1;
  emit(sink, {
    kind: EventKind.TurnStart,
    tick: tickNo,
    map: world.mapIndex,
    mapTick: world.tick + 1,
    active: world.evaders.size,
  });

  let next = moveEvaders(world, config, tickNo, sink);
  checkInvariants(next, tickNo);
  next = movePursuers(next, config, tickNo, sink);
  checkInvariants(next, tickNo);
  next = resolveCaptures(next, tickNo, sink);
  next = { ...next, tick: next.tick + 1, totalTicks: tickNo };

  const verdict = checkOutcome(next, config.maxTicks);
  if (verdict === "transition") {
    return transitionToNextMap(next, config, next.mapIndex + 1, rng, sink);
  }
  if (verdict) {
    emit(sink, {
      kind: TERMINAL_EVENTS[verdict],
      tick: tickNo,
      map: next.mapIndex,
      escaped: next.escaped.length,
      captured: next.tally.captured,
      totalTicks: tickNo,
    });
    return { ...next, outcome: verdict };
  }
  return next;
}

export interface RunOptions {
  sink?: EventSink;
  collect?: boolean;                      // attach an in-memory collector and return its events
  onTick?: (world: WorldState) => void;   // observe each world after its tick
}

/**
 * Run a configuration to completion with no delay between ticks.
 * Throws ConfigError before the first tick if the configuration is invalid.
 */
export function runSimulation(config: RunConfig, options: RunOptions = {}): SimulationResult {
  const sim = createSimulation(config);
  const collector = options.collect ? new EventCollector() : undefined;
  const sinks = [options.sink, collector].filter((s): s is EventSink => s !== undefined);
  const sink = sinks.length > 1 ? new MultiSink(sinks) : sinks[0];

  let world = sim.world;
  while (!world.outcome) {
    world = tick(world, sim.config, sim.rng, sink);
    options.onTick?.(world);
  }
  return buildResult(world, collector?.events);
}
