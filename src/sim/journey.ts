/**
 * Procedural journeys. Terrain is random noise from ROT.Map.Cellular with
 * one generation step that clears isolated cells and keeps clumps.
 * The same seed always yields the same maps.
 */
import * as ROT from "rot-js";
import type { MapConfig, Position } from "../shared/types.js";
import {
  DEFAULT_MAP_WIDTH, DEFAULT_MAP_HEIGHT, GENERATED_TERRAIN_DENSITY, GENERATED_CLEAR_RADIUS,
  GENERATED_BASE_PURSUERS,
} from "../shared/constants.js";
import { distance } from "./geometry.js";

export interface JourneyOptions {
  width?: number;
  height?: number;
  density?: number;
  basePursuers?: number;
}

const MAP_NAMES = ["Lowlands", "Old Forest", "Weather Hills", "Trollshaws", "High Pass", "Misty Vale"];

/**
 * Corner pairs, alternated per map so consecutive maps cross in different
 * directions.
 */
function cornersFor(index: number, width: number, height: number): { entry: Position; exit: Position } {
  const nw = { x: 1, y: 1 };
  const se = { x: width - 2, y: height - 2 };
  const ne = { x: width - 2, y: 1 };
  const sw = { x: 1, y: height - 2 };
  return index % 2 === 0 ? { entry: nw, exit: se } : { entry: ne, exit: sw };
}

/**
 * ROT's global RNG is reseeded here; run a journey through createSimulation
 * afterwards, which uses its own RNG instance.
 */
export function generateJourney(seed: number, mapCount: number, options: JourneyOptions = {}): MapConfig[] {
  const width = Math.max(5, options.width ?? DEFAULT_MAP_WIDTH);
  const height = Math.max(5, options.height ?? DEFAULT_MAP_HEIGHT);
  const density = options.density ?? GENERATED_TERRAIN_DENSITY;
  const basePursuers = options.basePursuers ?? GENERATED_BASE_PURSUERS;

  ROT.RNG.setSeed(seed);

  const maps: MapConfig[] = [];
  for (let i = 0; i < mapCount; i++) {
    const { entry, exit } = cornersFor(i, width, height);
    const terrain: Position[] = [];

    const cellular = new ROT.Map.Cellular(width, height, { born: [5, 6, 7, 8], survive: [1, 2, 3, 4, 5, 6, 7, 8] });
    cellular.randomize(density);
    cellular.create((x, y, value) => {
      if (value !== 1) return;
      const pos = { x, y };
      if (distance(pos, entry) <= GENERATED_CLEAR_RADIUS || distance(pos, exit) <= GENERATED_CLEAR_RADIUS) return;
      terrain.push(pos);
    });

    maps.push({
      name: MAP_NAMES[i % MAP_NAMES.length],
      width,
      height,
      terrain,
      entry,
      exit,
      pursuerSpawns: [],
      pursuerCount: basePursuers + i,
    });
  }
  return maps;
}
