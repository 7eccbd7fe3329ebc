import type { SimEvent, SimulationResult, WorldState } from "../shared/types.js";
import { Outcome } from "../shared/types.js";
import { InvariantError } from "./errors.js";

export type Verdict = Outcome | "transition" | null;

/**
 * Decide what happens after a tick, checked in priority order:
 * victory, defeat, timeout, then map transition. Null means keep going.
 * Expects the tick counters to already include the tick just played.
 */
export function checkOutcome(world: WorldState, maxTicks: number): Verdict {
  const active = world.evaders.size;
  const escapedHere = world.escaped.length;
  const lastMap = world.mapIndex === world.mapCount - 1;

  if (active === 0 && escapedHere > 0 && lastMap) return Outcome.Victory;
  if (active === 0 && escapedHere === 0) return Outcome.Defeat;
  if (world.totalTicks >= maxTicks) return Outcome.Timeout;
  if (active === 0) return "transition";
  return null;
}

/**
 * Summarize a finished world from its tallies.
 */
export function buildResult(world: WorldState, events?: SimEvent[]): SimulationResult {
  if (!world.outcome) {
    throw new InvariantError(`result requested for an unfinished run at tick ${world.totalTicks}`, {
      tick: world.totalTicks,
    });
  }
  const result: SimulationResult = {
    outcome: world.outcome,
    escaped: world.escaped.length,
    captured: world.tally.captured,
    totalArrivals: world.tally.escaped,
    active: world.evaders.size,
    totalTicks: world.totalTicks,
    mapTicks: [...world.mapTicks, world.tick],
    finalWorld: world,
  };
  if (events) result.events = events;
  return result;
}
