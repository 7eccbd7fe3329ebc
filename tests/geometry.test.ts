import { describe, it, expect } from "vitest";
import { distance, isValidPosition, posKey, rectTerrain, samePos, toTerrainSet } from "../src/sim/geometry.js";

describe("distance", () => {
  it("is Manhattan distance", () => {
    expect(distance({ x: 1, y: 2 }, { x: 4, y: 6 })).toBe(7);
    expect(distance({ x: 3, y: 3 }, { x: 0, y: 5 })).toBe(5);
  });

  it("is zero for the same cell and symmetric", () => {
    const a = { x: 7, y: 2 };
    const b = { x: -3, y: 9 };
    expect(distance(a, a)).toBe(0);
    expect(distance(a, b)).toBe(distance(b, a));
  });
});

describe("isValidPosition", () => {
  const terrain = toTerrainSet([{ x: 2, y: 2 }]);

  it("accepts open in-bounds cells", () => {
    expect(isValidPosition({ x: 0, y: 0 }, 5, 4, terrain)).toBe(true);
    expect(isValidPosition({ x: 4, y: 3 }, 5, 4, terrain)).toBe(true);
  });

  it("rejects cells outside the grid", () => {
    expect(isValidPosition({ x: -1, y: 0 }, 5, 4, terrain)).toBe(false);
    expect(isValidPosition({ x: 5, y: 0 }, 5, 4, terrain)).toBe(false);
    expect(isValidPosition({ x: 0, y: 4 }, 5, 4, terrain)).toBe(false);
  });

  it("rejects terrain", () => {
    expect(isValidPosition({ x: 2, y: 2 }, 5, 4, terrain)).toBe(false);
  });
});

describe("position helpers", () => {
  it("posKey and samePos compare by value", () => {
    expect(posKey({ x: 3, y: 11 })).toBe("3,11");
    expect(samePos({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(samePos({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
  });

  it("rectTerrain expands rectangles row by row", () => {
    expect(rectTerrain([{ x: 1, y: 0, w: 2, h: 2 }])).toEqual([
      { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 1 },
    ]);
  });
});
