/**
 * Per-entity decision rules. Both policies are greedy: one target, one
 * step rule, no search. Ties always go to the earlier entity in iteration
 * order (pursuer array order, evader id order) so runs replay exactly.
 */
import type { Evader, Grid, Position, Pursuer } from "../shared/types.js";
import { distance, samePos } from "./geometry.js";
import { moveAwayFrom, moveToward, moveWithSpeed } from "./movement.js";

export interface Nearest<T> {
  entity: T;
  distance: number;
}

function nearest<T extends { pos: Position }>(pos: Position, candidates: Iterable<T>): Nearest<T> | null {
  let best: Nearest<T> | null = null;
  for (const entity of candidates) {
    const d = distance(pos, entity.pos);
    if (!best || d < best.distance) {
      best = { entity, distance: d };
    }
  }
  return best;
}

export function nearestPursuer(pos: Position, pursuers: Iterable<Pursuer>): Nearest<Pursuer> | null {
  return nearest(pos, pursuers);
}

export function nearestEvader(pos: Position, evaders: Iterable<Evader>): Nearest<Evader> | null {
  return nearest(pos, evaders);
}

export interface EvaderDecision {
  pos: Position;
  threat: Nearest<Pursuer> | null; // set when the evader switched to evasion
}

/**
 * Flee the nearest pursuer when it is within `dangerDistance`, otherwise head
 * for the exit. A flee that cannot move at all (wall, edge, neighbours)
 * falls back to heading for the exit this tick.
 */
export function decideEvader(
  evader: Evader,
  exit: Position,
  pursuers: readonly Pursuer[],
  grid: Grid,
  occupied: ReadonlySet<string>,
  dangerDistance: number,
  speed: number,
): EvaderDecision {
  const seek = () => moveWithSpeed(evader.pos, p => moveToward(p, exit), speed, grid, occupied);

  const threat = nearestPursuer(evader.pos, pursuers);
  if (!threat || threat.distance > dangerDistance) {
    return { pos: seek(), threat: null };
  }

  const threatPos = threat.entity.pos;
  const fled = moveWithSpeed(evader.pos, p => moveAwayFrom(p, threatPos), speed, grid, occupied);
  if (samePos(fled, evader.pos)) {
    return { pos: seek(), threat };
  }
  return { pos: fled, threat };
}

export interface PursuerDecision {
  pos: Position;
  target: Evader | null; // null = idle, nobody left to chase
}

/** Chase the nearest active evader. */
export function decidePursuer(
  pursuer: Pursuer,
  evaders: readonly Evader[],
  grid: Grid,
  occupied: ReadonlySet<string>,
  speed: number,
): PursuerDecision {
  const target = nearestEvader(pursuer.pos, evaders);
  if (!target) return { pos: pursuer.pos, target: null };

  const goal = target.entity.pos;
  return {
    pos: moveWithSpeed(pursuer.pos, p => moveToward(p, goal), speed, grid, occupied),
    target: target.entity,
  };
}
