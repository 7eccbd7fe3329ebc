#!/usr/bin/env node
import { createInterface } from "node:readline";
import { setTimeout as sleep } from "node:timers/promises";
import { defaultJourney } from "../data/journeys.js";
import { renderLegend, renderToString } from "../render/terminal.js";
import { DEFAULT_EVADER_COUNT, DEFAULT_MAX_TICKS, DEFAULT_SEED } from "../shared/constants.js";
import type { EventSink, MapConfig, SimulationResult, WorldState } from "../shared/types.js";
import { Outcome } from "../shared/types.js";
import { ConfigError } from "../sim/errors.js";
import { generateJourney } from "../sim/journey.js";
import { buildResult } from "../sim/outcome.js";
import { tick } from "../sim/step.js";
import { createSimulation } from "../sim/world.js";
import type { Simulation } from "../sim/world.js";
import { JsonlFileSink } from "./eventLog.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  seed: number;
  maxTicks: number;
  evaders: number;
  journey: "default" | "generated";
  maps: number;
  delay: number;
  step: boolean;
  quiet: boolean;
  log: string | null;
}

function parseIntArg(flag: string, raw: string | undefined, min: number): number {
  const value = parseInt(raw ?? "", 10);
  if (Number.isNaN(value) || value < min) {
    console.error(`ERROR: ${flag} requires an integer >= ${min}`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: DEFAULT_SEED,
    maxTicks: DEFAULT_MAX_TICKS,
    evaders: DEFAULT_EVADER_COUNT,
    journey: "default",
    maps: 3,
    delay: 0,
    step: false,
    quiet: false,
    log: null,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--seed":
        opts.seed = parseIntArg("--seed", argv[++i], Number.MIN_SAFE_INTEGER);
        break;
      case "--max-ticks":
        opts.maxTicks = parseIntArg("--max-ticks", argv[++i], 1);
        break;
      case "--evaders":
        opts.evaders = parseIntArg("--evaders", argv[++i], 1);
        break;
      case "--journey": {
        const journey = argv[++i];
        if (journey !== "default" && journey !== "generated") {
          console.error("ERROR: --journey must be 'default' or 'generated'");
          process.exit(1);
        }
        opts.journey = journey;
        break;
      }
      case "--maps":
        opts.maps = parseIntArg("--maps", argv[++i], 1);
        break;
      case "--delay":
        opts.delay = parseIntArg("--delay", argv[++i], 0);
        break;
      case "--step":
        opts.step = true;
        break;
      case "--quiet":
        opts.quiet = true;
        break;
      case "--log":
        opts.log = argv[++i] ?? null;
        if (!opts.log) {
          console.error("ERROR: --log requires a file path");
          process.exit(1);
        }
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Display ──────────────────────────────────────────────────

function show(world: WorldState): void {
  console.log(renderToString(world));
  const legend = renderLegend(world);
  if (legend) console.log(legend);
  console.log("");
}

function printSummary(result: SimulationResult): void {
  console.log("");
  console.log("=== RUN OVER ===");
  console.log(`Result: ${result.outcome.toUpperCase()}`);
  console.log(`Escaped: ${result.escaped}`);
  console.log(`Captured: ${result.captured}`);
  console.log(`Exit arrivals: ${result.totalArrivals} (all maps)`);
  console.log(`Still on the road: ${result.active}`);
  console.log(`Ticks: ${result.totalTicks} (per map: ${result.mapTicks.join(", ")})`);
}

// ── Run modes ────────────────────────────────────────────────

/** Tick with an optional pause between frames. */
async function runPlayback(sim: Simulation, args: CliArgs, sink?: EventSink): Promise<WorldState> {
  let world = sim.world;
  if (!args.quiet) show(world);
  while (!world.outcome) {
    world = tick(world, sim.config, sim.rng, sink);
    if (!args.quiet) {
      show(world);
      if (args.delay > 0) await sleep(args.delay);
    }
  }
  return world;
}

/** Advance one tick per line on stdin. */
async function runStepwise(sim: Simulation, sink?: EventSink): Promise<WorldState> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  let world = sim.world;
  show(world);
  console.log("Press Enter to advance, 'quit' to stop.");

  for await (const line of rl) {
    const trimmed = line.trim().toLowerCase();
    if (trimmed === "quit" || trimmed === "exit") break;
    world = tick(world, sim.config, sim.rng, sink);
    show(world);
    if (world.outcome) break;
  }
  rl.close();
  return world;
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();

  const maps: MapConfig[] = args.journey === "generated"
    ? generateJourney(args.seed, args.maps)
    : defaultJourney();

  console.log("Escape Grid");
  console.log(`Seed: ${args.seed}  Journey: ${args.journey} (${maps.length} maps)  Evaders: ${args.evaders}  Max ticks: ${args.maxTicks}`);
  if (args.log) {
    console.log(`Event log: ${args.log}`);
  }
  console.log("");

  let sim: Simulation;
  try {
    sim = createSimulation({ maps, maxTicks: args.maxTicks, evaderCount: args.evaders, seed: args.seed });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`ERROR: invalid configuration: ${err.message}`);
      process.exit(2);
    }
    throw err;
  }

  const sink = args.log ? new JsonlFileSink(args.log) : undefined;
  const world = args.step ? await runStepwise(sim, sink) : await runPlayback(sim, args, sink);

  if (!world.outcome) {
    console.log("Stopped before the run finished.");
    process.exit(1);
  }

  const result = buildResult(world);
  printSummary(result);
  process.exit(result.outcome === Outcome.Victory ? 0 : 1);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
