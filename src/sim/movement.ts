import type { Grid, Position } from "../shared/types.js";
import { isValidPosition, posKey, samePos } from "./geometry.js";

export type StepFn = (current: Position) => Position;

/**
 * One greedy step along (dx, dy). The larger axis moves alone; a tie moves
 * both axes (diagonal). Gives a staircase path rather than a straight line.
 */
function stepAlong(current: Position, dx: number, dy: number): Position {
  const ax = Math.abs(dx);
  const ay = Math.abs(dy);
  if (ax > ay) {
    return { x: current.x + Math.sign(dx), y: current.y };
  }
  if (ay > ax) {
    return { x: current.x, y: current.y + Math.sign(dy) };
  }
  return { x: current.x + Math.sign(dx), y: current.y + Math.sign(dy) };
}

export function moveToward(current: Position, target: Position): Position {
  return stepAlong(current, target.x - current.x, target.y - current.y);
}

export function moveAwayFrom(current: Position, threat: Position): Position {
  return stepAlong(current, current.x - threat.x, current.y - threat.y);
}

/**
 * Take up to `speed` steps from `stepFn`. Stops at the first step that leaves
 * the grid, lands on terrain or an occupied cell, or goes nowhere; no other
 * direction is tried. Returns the last legal position.
 */
export function moveWithSpeed(
  current: Position,
  stepFn: StepFn,
  speed: number,
  grid: Grid,
  occupied: ReadonlySet<string>,
): Position {
  let pos = current;
  for (let i = 0; i < speed; i++) {
    const next = stepFn(pos);
    if (samePos(next, pos)) break;
    if (!isValidPosition(next, grid.width, grid.height, grid.terrain)) break;
    if (occupied.has(posKey(next))) break;
    pos = next;
  }
  return pos;
}
