import { describe, it, expect } from "vitest";
import { evaderGlyphs, renderLegend, renderStatus, renderToString } from "../src/render/terminal.js";
import { createSimulation } from "../src/sim/world.js";
import { DEFAULT_ROSTER } from "../src/data/roster.js";
import type { Evader, MapConfig } from "../src/shared/types.js";

const field: MapConfig = {
  name: "Field",
  width: 4,
  height: 3,
  terrain: [{ x: 1, y: 1 }],
  entry: { x: 0, y: 0 },
  exit: { x: 3, y: 2 },
  pursuerSpawns: [{ x: 3, y: 0 }],
};

function fieldWorld() {
  return createSimulation({ maps: [field], maxTicks: 10, evaderCount: 2, seed: 1, roster: ["frodo", "Sam"] }).world;
}

describe("terminal renderer", () => {
  it("draws the grid with evaders over the entry, renumbering a clash with the legend", () => {
    const lines = renderToString(fieldWorld()).split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "F 1 . N",
      ". # . .",
      ". . . R",
    ]);
  });

  it("ends with the status line", () => {
    const world = fieldWorld();
    const lines = renderToString(world).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe(renderStatus(world));
    expect(renderStatus(world)).toBe("Map 1/1 Field  Tick 0 (total 0)  Active 2  Escaped 0  Captured 0");
  });

  it("shows the entry once nobody stands on it", () => {
    const world = { ...fieldWorld(), evaders: new Map<string, Evader>() };
    expect(renderToString(world).split("\n")[0]).toBe("S . . N");
  });

  it("lists each evader with its glyph and cell", () => {
    expect(renderLegend(fieldWorld())).toBe("F frodo (0,0)\n1 Sam (1,0)");
  });

});

describe("evaderGlyphs", () => {
  const at = (id: string, name: string): Evader => ({ id, name, pos: { x: 0, y: 0 } });

  it("gives the default roster one distinct letter each", () => {
    const glyphs = evaderGlyphs(DEFAULT_ROSTER.map((name, i) => at(`evader_${i}`, name)));
    expect([...glyphs.values()]).toEqual(["F", "P", "M", "B", "L", "H", "T", "D", "E", "G"]);
  });

  it("hands out digits for repeated, reserved or missing initials", () => {
    const glyphs = evaderGlyphs([
      at("a", "Frodo"), at("b", "Fatty"), at("c", "Rosie"), at("d", "nobody"), at("e", ""),
    ]);
    expect([...glyphs.entries()]).toEqual([["a", "F"], ["b", "1"], ["c", "2"], ["d", "3"], ["e", "4"]]);
  });

  it("uses ? once the digits are spent", () => {
    const crowd = Array.from({ length: 12 }, (_, i) => at(`evader_${i}`, "Sam"));
    const glyphs = evaderGlyphs(crowd);
    expect(glyphs.get("evader_9")).toBe("0");
    expect(glyphs.get("evader_10")).toBe("?");
    expect(glyphs.get("evader_11")).toBe("?");
  });
});
