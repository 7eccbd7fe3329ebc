/**
 * Grid geometry shared by movement, policies and the world model.
 */
import type { Position } from "../shared/types.js";

export function posKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}

export function samePos(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Manhattan distance. Used for both evasion and pursuit. */
export function distance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function inBounds(pos: Position, width: number, height: number): boolean {
  return pos.x >= 0 && pos.x < width && pos.y >= 0 && pos.y < height;
}

export function isValidPosition(
  pos: Position,
  width: number,
  height: number,
  terrain: ReadonlySet<string>,
): boolean {
  return inBounds(pos, width, height) && !terrain.has(posKey(pos));
}

export function toTerrainSet(cells: Position[]): Set<string> {
  return new Set(cells.map(posKey));
}

/**
 * Expand rectangles (inclusive of x/y, exclusive of x+w/y+h) into cells.
 */
export function rectTerrain(rects: { x: number; y: number; w: number; h: number }[]): Position[] {
  const cells: Position[] = [];
  for (const r of rects) {
    for (let y = r.y; y < r.y + r.h; y++) {
      for (let x = r.x; x < r.x + r.w; x++) {
        cells.push({ x, y });
      }
    }
  }
  return cells;
}
