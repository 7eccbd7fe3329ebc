import { describe, it, expect } from "vitest";
import { runSimulation, tick } from "../src/sim/step.js";
import { createSimulation } from "../src/sim/world.js";
import { EventCollector } from "../src/sim/events.js";
import { EntityRole, EventKind, Outcome } from "../src/shared/types.js";
import type { MapConfig, MapTransitionEvent, SimEvent } from "../src/shared/types.js";

function ofKind<K extends SimEvent["kind"]>(events: SimEvent[] | undefined, kind: K): Extract<SimEvent, { kind: K }>[] {
  return (events ?? []).filter((e): e is Extract<SimEvent, { kind: K }> => e.kind === kind);
}

describe("full runs", () => {
  it("a lone evader on an empty field walks the diagonal out", () => {
    const map: MapConfig = {
      name: "Open", width: 20, height: 20, terrain: [],
      entry: { x: 1, y: 1 }, exit: { x: 18, y: 18 }, pursuerSpawns: [],
    };
    const result = runSimulation({ maps: [map], maxTicks: 100, evaderCount: 1, seed: 1 });

    expect(result.outcome).toBe(Outcome.Victory);
    expect(result.escaped).toBe(1);
    expect(result.captured).toBe(0);
    expect(result.active).toBe(0);
    expect(result.totalTicks).toBe(9);
    expect(result.mapTicks).toEqual([9]);
  });

  it("a cornered evader is caught on the first tick", () => {
    const map: MapConfig = {
      name: "Dead End",
      width: 5,
      height: 3,
      terrain: [
        { x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 },
        { x: 0, y: 1 },
        { x: 0, y: 2 }, { x: 1, y: 2 }, { x: 2, y: 2 },
      ],
      entry: { x: 1, y: 1 },
      exit: { x: 4, y: 1 },
      pursuerSpawns: [{ x: 2, y: 1 }],
    };
    const result = runSimulation({ maps: [map], maxTicks: 20, evaderCount: 1, seed: 1 }, { collect: true });

    expect(result.outcome).toBe(Outcome.Defeat);
    expect(result.totalTicks).toBe(1);
    expect(result.events).toEqual([
      { kind: EventKind.TurnStart, tick: 1, map: 0, mapTick: 1, active: 1 },
      {
        kind: EventKind.Evaded, tick: 1, map: 0, entity: "evader_0", name: "Frodo",
        pos: { x: 1, y: 1 }, threat: "pursuer_0", distance: 1,
      },
      {
        kind: EventKind.Moved, tick: 1, map: 0, entity: "pursuer_0", role: EntityRole.Pursuer,
        from: { x: 2, y: 1 }, to: { x: 1, y: 1 },
      },
      { kind: EventKind.Captured, tick: 1, map: 0, entity: "evader_0", name: "Frodo", pos: { x: 1, y: 1 }, by: "pursuer_0" },
      { kind: EventKind.Defeat, tick: 1, map: 0, escaped: 0, captured: 1, totalTicks: 1 },
    ]);
  });

  it("an evader that cannot reach a walled-in exit times out", () => {
    const ring = [
      { x: 7, y: 7 }, { x: 8, y: 7 }, { x: 9, y: 7 },
      { x: 7, y: 8 }, { x: 9, y: 8 },
      { x: 7, y: 9 }, { x: 8, y: 9 }, { x: 9, y: 9 },
    ];
    const map: MapConfig = {
      name: "Walled", width: 10, height: 10, terrain: ring,
      entry: { x: 1, y: 1 }, exit: { x: 8, y: 8 }, pursuerSpawns: [],
    };
    const result = runSimulation({ maps: [map], maxTicks: 10, evaderCount: 1, seed: 1 }, { collect: true });

    expect(result.outcome).toBe(Outcome.Timeout);
    expect(result.totalTicks).toBe(10);
    expect(result.escaped).toBe(0);
    expect(result.captured).toBe(0);
    expect(result.active).toBe(1);
    expect(result.finalWorld.evaders.get("evader_0")?.pos).toEqual({ x: 6, y: 6 });
    expect(ofKind(result.events, EventKind.Moved).map(e => e.to)).toEqual([
      { x: 3, y: 3 }, { x: 5, y: 5 }, { x: 6, y: 6 },
    ]);
    expect(result.events?.filter(e => e.kind === EventKind.Timeout)).toEqual([
      { kind: EventKind.Timeout, tick: 10, map: 0, escaped: 0, captured: 0, totalTicks: 10 },
    ]);
  });

  it("carries the whole party across three maps", () => {
    const open = (name: string, entry: { x: number; y: number }, exit: { x: number; y: number }): MapConfig => ({
      name, width: 10, height: 10, terrain: [{ x: 0, y: 9 }, { x: 9, y: 0 }], entry, exit, pursuerSpawns: [],
    });
    const maps = [
      open("First", { x: 1, y: 1 }, { x: 8, y: 8 }),
      open("Second", { x: 8, y: 8 }, { x: 1, y: 1 }),
      open("Third", { x: 1, y: 8 }, { x: 8, y: 1 }),
    ];
    const result = runSimulation({ maps, maxTicks: 200, evaderCount: 3, seed: 5 }, { collect: true });

    expect(result.outcome).toBe(Outcome.Victory);
    expect(result.escaped).toBe(3);
    expect(result.totalArrivals).toBe(9);
    expect(result.captured).toBe(0);
    expect(result.finalWorld.mapIndex).toBe(2);
    expect(result.mapTicks).toHaveLength(3);
    expect(result.mapTicks.reduce((a, b) => a + b, 0)).toBe(result.totalTicks);

    const transitions: MapTransitionEvent[] = ofKind(result.events, EventKind.MapTransition);
    expect(transitions.map(t => [t.fromMapId, t.toMapId])).toEqual([[0, 1], [1, 2]]);
    expect(transitions[0].tick).toBe(result.mapTicks[0]);
    expect(transitions[1].tick).toBe(result.mapTicks[0] + result.mapTicks[1]);
    expect([...transitions[0].carried].sort()).toEqual(["Frodo", "Merry", "Pippin"]);
  });

  it("lets an evader pinned to the south edge run along it", () => {
    const map: MapConfig = {
      name: "Edge", width: 20, height: 20, terrain: [],
      entry: { x: 10, y: 19 }, exit: { x: 19, y: 19 }, pursuerSpawns: [{ x: 10, y: 15 }],
    };
    const sim = createSimulation({ maps: [map], maxTicks: 50, evaderCount: 1, seed: 1 });
    const collector = new EventCollector();

    const next = tick(sim.world, sim.config, sim.rng, collector);

    expect(next.evaders.get("evader_0")?.pos).toEqual({ x: 12, y: 19 });
    expect(next.pursuers[0].pos).toEqual({ x: 10, y: 16 });
    expect(ofKind(collector.events, EventKind.Evaded)).toHaveLength(1);
  });

  it("counts every evader exactly once at the end", () => {
    const map: MapConfig = {
      name: "Crowded", width: 12, height: 12, terrain: [],
      entry: { x: 1, y: 1 }, exit: { x: 10, y: 10 }, pursuerSpawns: [{ x: 6, y: 6 }, { x: 10, y: 1 }],
    };
    const result = runSimulation({ maps: [map], maxTicks: 100, evaderCount: 5, seed: 3 });
    expect(result.escaped + result.captured + result.active).toBe(5);
  });
});
