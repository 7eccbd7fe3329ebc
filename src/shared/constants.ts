// ── Run defaults ─────────────────────────────────────────────
export const DEFAULT_SEED = 52417;
export const DEFAULT_MAX_TICKS = 200;
export const DEFAULT_EVADER_COUNT = 4;
export const DEFAULT_MAP_WIDTH = 20;
export const DEFAULT_MAP_HEIGHT = 20;

// ── Evaders ──────────────────────────────────────────────────
export const DANGER_DISTANCE = 6; // nearest pursuer at or inside this distance triggers evasion
export const EVADER_SPEED = 2;    // single steps per tick

// ── Pursuers ─────────────────────────────────────────────────
export const PURSUER_SPEED = 1;

// ── Procedural journeys ──────────────────────────────────────
export const GENERATED_TERRAIN_DENSITY = 0.2;    // chance a cell starts as terrain
export const GENERATED_CLEAR_RADIUS = 2;       // kept open around entry and exit
export const GENERATED_BASE_PURSUERS = 1;      // pursuers on the first generated map, +1 per map

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  empty: ".",
  terrain: "#",
  entry: "S",
  exit: "R",
  pursuer: "N",
} as const;
