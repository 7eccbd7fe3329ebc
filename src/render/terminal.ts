import type { Evader, WorldState } from "../shared/types.js";
import { GLYPHS } from "../shared/constants.js";
import { posKey } from "../sim/geometry.js";

const RESERVED = new Set<string>(Object.values(GLYPHS));
const FALLBACK_GLYPHS = "1234567890";

/**
 * Glyph per evader id: the upper-cased initial, or the first free digit when
 * the initial is missing, taken by an earlier evader or used by the legend.
 * `?` once the digits run out.
 */
export function evaderGlyphs(evaders: Iterable<Evader>): Map<string, string> {
  const glyphs = new Map<string, string>();
  const used = new Set<string>();
  for (const evader of evaders) {
    let glyph = evader.name.charAt(0).toUpperCase();
    if (!glyph || RESERVED.has(glyph) || used.has(glyph)) {
      glyph = [...FALLBACK_GLYPHS].find(d => !used.has(d)) ?? "?";
    }
    used.add(glyph);
    glyphs.set(evader.id, glyph);
  }
  return glyphs;
}

/**
 * Render a world to plain text: one row per line, cells separated by a
 * space, then a status line. Pursuers draw over evaders, evaders over the
 * entry and exit.
 */
export function renderToString(world: WorldState): string {
  const rows: string[][] = [];
  for (let y = 0; y < world.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < world.width; x++) {
      row.push(world.terrain.has(posKey({ x, y })) ? GLYPHS.terrain : GLYPHS.empty);
    }
    rows.push(row);
  }

  rows[world.entry.y][world.entry.x] = GLYPHS.entry;
  rows[world.exit.y][world.exit.x] = GLYPHS.exit;
  const glyphs = evaderGlyphs(world.evaders.values());
  for (const evader of world.evaders.values()) {
    rows[evader.pos.y][evader.pos.x] = glyphs.get(evader.id) ?? "?";
  }
  for (const pursuer of world.pursuers) {
    rows[pursuer.pos.y][pursuer.pos.x] = GLYPHS.pursuer;
  }

  const lines = rows.map(row => row.join(" "));
  lines.push(renderStatus(world));
  return lines.join("\n");
}

export function renderStatus(world: WorldState): string {
  return `Map ${world.mapIndex + 1}/${world.mapCount} ${world.mapName}  ` +
    `Tick ${world.tick} (total ${world.totalTicks})  ` +
    `Active ${world.evaders.size}  Escaped ${world.escaped.length}  Captured ${world.tally.captured}`;
}

/** One line per active evader: glyph, name, position. */
export function renderLegend(world: WorldState): string {
  const glyphs = evaderGlyphs(world.evaders.values());
  return Array.from(world.evaders.values(), e => `${glyphs.get(e.id) ?? "?"} ${e.name} (${e.pos.x},${e.pos.y})`).join("\n");
}
