import { defaultJourney } from "./data/journeys.js";
import { renderToString } from "./render/terminal.js";
import { DEFAULT_EVADER_COUNT, DEFAULT_MAX_TICKS, DEFAULT_SEED } from "./shared/constants.js";
import { runSimulation } from "./sim/step.js";
import { createSimulation } from "./sim/world.js";

const config = {
  maps: defaultJourney(),
  maxTicks: DEFAULT_MAX_TICKS,
  evaderCount: DEFAULT_EVADER_COUNT,
  seed: DEFAULT_SEED,
};

console.log(renderToString(createSimulation(config).world));
const result = runSimulation(config);
console.log("\nEscape Grid v0.1.0");
console.log(`Seed: ${config.seed}`);
console.log(`Result: ${result.outcome}  Escaped: ${result.escaped}  Captured: ${result.captured}  Ticks: ${result.totalTicks}`);
