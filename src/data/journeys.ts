/**
 * Hand-made three-map journey used by the CLI and main.ts.
 * Terrain is written as rectangles; see rectTerrain().
 */
import type { MapConfig } from "../shared/types.js";
import { rectTerrain } from "../sim/geometry.js";

export function defaultJourney(): MapConfig[] {
  return [
    {
      name: "Shire Road",
      width: 20,
      height: 20,
      terrain: rectTerrain([
        { x: 5, y: 12, w: 4, h: 1 },  // hedge
        { x: 12, y: 3, w: 1, h: 4 },  // hedge
      ]),
      entry: { x: 1, y: 1 },
      exit: { x: 18, y: 18 },
      pursuerSpawns: [{ x: 10, y: 10 }, { x: 15, y: 5 }],
    },
    {
      name: "Barrow Downs",
      width: 20,
      height: 20,
      terrain: rectTerrain([
        { x: 1, y: 3, w: 5, h: 1 },   // northern ridge
        { x: 14, y: 14, w: 1, h: 5 }, // southern ridge
        { x: 3, y: 6, w: 2, h: 2 },   // barrow
      ]),
      entry: { x: 18, y: 1 },
      exit: { x: 1, y: 18 },
      pursuerSpawns: [{ x: 9, y: 9 }, { x: 4, y: 15 }, { x: 15, y: 4 }],
    },
    {
      name: "Bruinen Ford",
      width: 20,
      height: 20,
      terrain: rectTerrain([
        { x: 6, y: 0, w: 1, h: 7 },
        { x: 6, y: 13, w: 1, h: 7 },
        { x: 13, y: 0, w: 1, h: 8 },
        { x: 13, y: 12, w: 1, h: 8 },
      ]),
      entry: { x: 1, y: 10 },
      exit: { x: 18, y: 10 },
      pursuerSpawns: [{ x: 10, y: 3 }, { x: 10, y: 16 }],
      pursuerCount: 3,
    },
  ];
}
